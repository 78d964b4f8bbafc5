import { describe, expect, it } from "vitest"
import { Document } from "../src/Document"
import { TypeMismatchError } from "../src/error"

describe("container helpers", () => {
  describe("length", () => {
    it.each([
      { desc: "array", value: [1, 2, 3], expected: 3 },
      { desc: "object", value: { a: 1, b: 2 }, expected: 2 },
      { desc: "string", value: "héllo", expected: 5 },
      { desc: "string with astral code points", value: "👍a", expected: 2 },
      { desc: "empty array", value: [], expected: 0 },
    ])("counts $desc", ({ value, expected }) => {
      expect(new Document(value).length).toBe(expected)
    })

    it.each([1, true, null])("fails for %s", (value) => {
      expect(() => new Document(value).length).toThrow(TypeMismatchError)
    })
  })

  describe("has", () => {
    it("finds array elements by deep equality", () => {
      const doc = new Document([1, { a: [2] }])
      expect(doc.has(1)).toBe(true)
      expect(doc.has({ a: [2] })).toBe(true)
      expect(doc.has({ a: [3] })).toBe(false)
    })

    it("finds object keys", () => {
      const doc = new Document({ one: 1, two: 2 })
      expect(doc.has("two")).toBe(true)
      expect(doc.has("three")).toBe(false)
      expect(doc.has(2)).toBe(false)
      expect(doc.has("toString")).toBe(false)
    })

    it("finds substrings", () => {
      const doc = new Document("1234")
      expect(doc.has("23")).toBe(true)
      expect(doc.has("5")).toBe(false)
      expect(doc.has(2)).toBe(false)
    })

    it("fails for scalars", () => {
      expect(() => new Document(1).has(1)).toThrow(TypeMismatchError)
    })
  })

  describe("iteration", () => {
    it("yields array items in order", () => {
      const doc = new Document(["a", "b"])
      expect([...doc.keys()]).toStrictEqual([0, 1])
      expect([...doc].map((item) => item.value)).toStrictEqual(["a", "b"])
    })

    it("yields object members in insertion order", () => {
      const doc = new Document({ b: 1, a: 2 })
      expect([...doc.keys()]).toStrictEqual(["b", "a"])
      expect([...doc].map((member) => member.path)).toStrictEqual([["b"], ["a"]])
    })

    it("can be repeated", () => {
      const doc = new Document([1, 2])
      expect([...doc]).toHaveLength(2)
      expect([...doc]).toHaveLength(2)
    })

    it("does not include missing defaults", () => {
      const doc = new Document({}, { schema: { properties: { a: { default: 1 } } } })
      expect([...doc.keys()]).toStrictEqual([])
    })

    it("fails for strings and scalars", () => {
      expect(() => [...new Document("ab")]).toThrow(TypeMismatchError)
      expect(() => new Document(1).keys()).toThrow(TypeMismatchError)
    })
  })
})
