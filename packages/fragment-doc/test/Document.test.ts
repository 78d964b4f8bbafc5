import { describe, expect, it } from "vitest"
import {
  Document,
  type DocumentChange,
  type SchemaNode,
  SchemaError,
  TypeMismatchError,
  ValidationError,
} from "../src/index"

describe("Document", () => {
  describe("initial value", () => {
    it("starts as an empty object", () => {
      const doc = new Document()
      expect(doc.value).toStrictEqual({})
      expect(doc.isDefault).toBe(false)
    })

    it("keeps an explicit null", () => {
      const doc = new Document(null, { schema: { default: { a: 1 } } })
      expect(doc.value).toBe(null)
      expect(() => doc.get("a")).toThrow(TypeMismatchError)
    })

    it("uses a copy of the root default when no value is given", () => {
      const rootDefault = { theme: "dark" }
      const doc = new Document(undefined, { schema: { type: "object", default: rootDefault } })
      expect(doc.value).toStrictEqual({ theme: "dark" })
      expect(doc.value).not.toBe(rootDefault)
      expect(doc.isDefault).toBe(true)
    })

    it("rejects schemas that are not objects", () => {
      const schema: SchemaNode = JSON.parse("[]")
      expect(() => new Document({}, { schema })).toThrow(SchemaError)
    })
  })

  it("is never orphaned", () => {
    const doc = new Document({ a: 1 })
    doc.value = { b: 2 }
    doc.value = null
    expect(doc.isOrphaned).toBe(false)
    expect(doc.document).toBe(doc)
    expect(doc.path).toStrictEqual([])
  })

  describe("revision", () => {
    it("counts replacements and reverts only", () => {
      const doc = new Document({}, { schema: { properties: { a: { default: 0 } } } })
      expect(doc.revision).toBe(0)

      doc.get("a")
      expect(doc.revision).toBe(0)

      doc.set("a", 1)
      expect(doc.revision).toBe(1)

      doc.set("a", 1)
      expect(doc.revision).toBe(1)

      doc.get("a").revertToDefault()
      expect(doc.revision).toBe(2)
    })
  })

  describe("subscribe", () => {
    it("reports sets and reverts until unsubscribed", () => {
      const doc = new Document({}, { schema: { properties: { a: { default: 0 } } } })
      const changes: DocumentChange[] = []
      const unsubscribe = doc.subscribe((change) => changes.push(change))

      doc.set("a", 1)
      doc.get("a").value = 2
      doc.get("a").revertToDefault()
      unsubscribe()
      doc.set("b", 3)

      expect(changes).toStrictEqual([
        { kind: "set", path: ["a"], value: 1 },
        { kind: "set", path: ["a"], value: 2 },
        { kind: "revert", path: ["a"] },
      ])
    })

    it("does not report no-op writes", () => {
      const doc = new Document({ a: 1 })
      const changes: DocumentChange[] = []
      doc.subscribe((change) => changes.push(change))
      doc.set("a", 1)
      expect(changes).toStrictEqual([])
    })

    it("lets listeners read through the writing fragment", () => {
      const doc = new Document({ a: 1 })
      const a = doc.get("a")
      const seen: unknown[] = []
      doc.subscribe(() => seen.push(a.value))
      a.value = 2
      expect(seen).toStrictEqual([2])
      expect(a.isOrphaned).toBe(false)
    })
  })

  describe("validation", () => {
    const schema: SchemaNode = {
      type: "object",
      properties: {
        name: { type: "string" },
        age: { type: "number" },
      },
    }

    it("points at the offending value and keyword", () => {
      const doc = new Document({ name: "joe", age: "thirty two" }, { schema })
      const error = doc.validate()
      expect(error).toBeInstanceOf(ValidationError)
      expect(error?.valuePath).toBe("object.age")
      expect(error?.schemaPath).toBe("schema.properties.age.type")
      expect(error?.message).toBe("object.age: must be number (schema.properties.age.type)")
      expect(() => doc.assertValid()).toThrow(ValidationError)
    })

    it("accepts conforming documents", () => {
      const doc = new Document({ name: "joe", age: 32 }, { schema })
      expect(doc.validate()).toBe(null)
    })

    it("uses a custom validator for every fragment", () => {
      const doc = new Document(
        { a: 1 },
        { validate: () => new ValidationError("nope", [], []) }
      )
      expect(doc.validate()?.message).toBe("object: nope (schema)")
      expect(doc.get("a").validate()?.detail).toBe("nope")
    })
  })
})
