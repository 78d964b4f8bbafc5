import { describe, expect, it } from "vitest"
import { formatPath, formatSchemaPath, formatValuePath } from "../src/path"

describe("path formatting", () => {
  it.each([
    { path: [], expected: "object" },
    { path: ["a", "b"], expected: "object.a.b" },
    { path: ["users", 0, "name"], expected: "object.users[0].name" },
    { path: ["first name"], expected: 'object["first name"]' },
    { path: ["1st"], expected: 'object["1st"]' },
    { path: ["$ref", "_x"], expected: "object.$ref._x" },
  ])("formats $expected", ({ path, expected }) => {
    expect(formatValuePath(path)).toBe(expected)
  })

  it("roots schema paths at schema", () => {
    expect(formatSchemaPath(["properties", "age", "type"])).toBe("schema.properties.age.type")
    expect(formatSchemaPath(["type", 1])).toBe("schema.type[1]")
  })

  it("accepts any root", () => {
    expect(formatPath("settings", ["theme"])).toBe("settings.theme")
  })
})
