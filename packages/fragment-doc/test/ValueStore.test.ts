import { describe, expect, it } from "vitest"
import { NoSuchElementError } from "../src/error"
import type { JSONRecord, JSONValue } from "../src/json"
import { childSlot, ROOT_SLOT, ValueStore } from "../src/ValueStore"

describe("ValueStore", () => {
  describe("object slots", () => {
    it("reads present and absent keys", () => {
      const root: JSONRecord = { a: 1 }
      const store = new ValueStore(root)
      expect(store.read(childSlot(root, "a"))).toBe(1)
      expect(store.has(childSlot(root, "b"))).toBe(false)
      // inherited properties are not members
      expect(store.has(childSlot(root, "toString"))).toBe(false)
    })

    it("bumps versions and revision on write", () => {
      const root: JSONRecord = { a: 1 }
      const store = new ValueStore(root)
      const slot = childSlot(root, "a")
      expect(store.version(slot)).toBe(0)

      store.write(slot, 2, ["a"])
      expect(root).toStrictEqual({ a: 2 })
      expect(store.version(slot)).toBe(1)
      expect(store.revision).toBe(1)
    })

    it("materializes defaults without bumping", () => {
      const root: JSONRecord = {}
      const store = new ValueStore(root)
      const slot = childSlot(root, "b")

      store.materialize(slot, 5, ["b"])
      expect(root).toStrictEqual({ b: 5 })
      expect(store.isDefault(slot)).toBe(true)
      expect(store.version(slot)).toBe(0)
      expect(store.revision).toBe(0)

      store.write(slot, 5, ["b"])
      expect(store.isDefault(slot)).toBe(false)
      expect(store.version(slot)).toBe(1)
    })

    it("removes keys", () => {
      const root: JSONRecord = { a: 1, b: 2 }
      const store = new ValueStore(root)
      const slot = childSlot(root, "a")

      store.remove(slot)
      expect(root).toStrictEqual({ b: 2 })
      expect(store.has(slot)).toBe(false)
      expect(store.version(slot)).toBe(1)
    })

    it("draws versions from the revision counter", () => {
      const root: JSONRecord = {}
      const store = new ValueStore(root)
      store.write(childSlot(root, "a"), 1, ["a"])
      store.write(childSlot(root, "b"), 1, ["b"])
      store.write(childSlot(root, "a"), 2, ["a"])
      expect(store.version(childSlot(root, "a"))).toBe(3)
      expect(store.version(childSlot(root, "b"))).toBe(2)
    })
  })

  describe("array slots", () => {
    it("reads only integer indices in range", () => {
      const list: JSONValue[] = ["x"]
      const store = new ValueStore(list)
      expect(store.read(childSlot(list, 0))).toBe("x")
      expect(store.has(childSlot(list, 1))).toBe(false)
      expect(store.has(childSlot(list, -1))).toBe(false)
      expect(store.has(childSlot(list, "0"))).toBe(false)
    })

    it("appends at length and refuses holes", () => {
      const list: JSONValue[] = [1]
      const store = new ValueStore(list)
      store.write(childSlot(list, 1), 2, [1])
      expect(list).toStrictEqual([1, 2])
      expect(() => store.write(childSlot(list, 3), 4, [3])).toThrow(NoSuchElementError)
      expect(list).toStrictEqual([1, 2])
    })
  })

  describe("root slot", () => {
    it("can start absent", () => {
      const store = new ValueStore(undefined)
      expect(store.has(ROOT_SLOT)).toBe(false)
      expect(store.root).toBe(undefined)
    })

    it("tracks default marks", () => {
      const store = new ValueStore(undefined)
      store.materialize(ROOT_SLOT, {}, [])
      expect(store.isDefault(ROOT_SLOT)).toBe(true)
      store.markReal(ROOT_SLOT)
      expect(store.isDefault(ROOT_SLOT)).toBe(false)
      expect(store.revision).toBe(0)
    })

    it("bumps its version on replacement and removal", () => {
      const store = new ValueStore({})
      store.write(ROOT_SLOT, [], [])
      expect(store.version(ROOT_SLOT)).toBe(1)
      store.remove(ROOT_SLOT)
      expect(store.version(ROOT_SLOT)).toBe(2)
      expect(store.root).toBe(undefined)
    })
  })
})
