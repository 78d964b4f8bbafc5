import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv"
import Ajv from "ajv-draft-04"
import { SchemaError, ValidationError } from "./error"
import type { Item, JSONValue, Path } from "./json"
import { formatSchemaPath } from "./path"
import { isSchemaNode, isTypeTag, type SchemaNode, type TypeTag } from "./SchemaView"
import { isObject, isRecord } from "./utils"

/**
 * Validator collaborator.
 * Returns the first violation found, or `null` when `value` conforms to `schema`.
 */
export type ValidateFn = (value: JSONValue, schema: SchemaNode) => ValidationError | null

const ajv = new Ajv({
  strict: false,
  allowUnionTypes: true,
  allErrors: false,
  useDefaults: false,
  coerceTypes: false,
  validateFormats: false,
  multipleOfPrecision: 9,
})

// draft-04 keyword -> the draft-03 keyword it was rewritten from
const RENAMED_KEYWORDS: Readonly<Record<string, string>> = {
  anyOf: "type",
  multipleOf: "divisibleBy",
}

const COPIED_KEYWORDS = [
  "enum",
  "minimum",
  "maximum",
  "exclusiveMinimum",
  "exclusiveMaximum",
  "minLength",
  "maxLength",
  "pattern",
  "minItems",
  "maxItems",
  "uniqueItems",
] as const satisfies readonly (keyof SchemaNode)[]

function typeSchema(tag: TypeTag): SchemaObject {
  return tag === "any" ? {} : { type: tag }
}

function translateType(type: SchemaNode["type"], at: Path, out: SchemaObject): void {
  if (type === undefined) return
  const alternatives: unknown[] = Array.isArray(type) ? type : [type]
  if (alternatives.length === 0) return

  if (alternatives.every(isTypeTag)) {
    if (!alternatives.includes("any")) {
      out.type = alternatives.length === 1 ? alternatives[0] : alternatives
    }
    return
  }
  // union schemas: one anyOf branch per alternative, in the same order
  out.anyOf = alternatives.map((alternative, i) => {
    if (isTypeTag(alternative)) return typeSchema(alternative)
    if (isSchemaNode(alternative)) return translate(alternative, [...at, "type", i])
    throw new SchemaError(`${formatSchemaPath([...at, "type", i])} is not a known type`)
  })
}

/**
 * Rewrites a draft-03 schema node into the draft-04 form ajv understands.
 * The result keeps the source layout, so error paths map back keyword by keyword.
 */
function translate(node: SchemaNode, at: Path): SchemaObject {
  if (!isSchemaNode(node)) {
    throw new SchemaError(`${formatSchemaPath(at)} must be an object`)
  }
  const out: SchemaObject = {}
  const type = node.type
  if (type !== undefined && !Array.isArray(type) && !isTypeTag(type)) {
    throw new SchemaError(`${formatSchemaPath([...at, "type"])} is not a known type`)
  }
  translateType(type, at, out)

  for (const keyword of COPIED_KEYWORDS) {
    if (node[keyword] !== undefined) {
      out[keyword] = node[keyword]
    }
  }
  if (node.divisibleBy !== undefined) {
    out.multipleOf = node.divisibleBy
  }

  if (node.properties !== undefined) {
    const properties: SchemaObject = {}
    const required: string[] = []
    for (const name of Object.keys(node.properties)) {
      const property = node.properties[name]
      properties[name] = translate(property, [...at, "properties", name])
      // a missing property with a default reads as the default
      if (property.optional !== true && property.default === undefined) {
        required.push(name)
      }
    }
    out.properties = properties
    if (required.length > 0) {
      out.required = required
    }
  }
  const { additionalProperties, items, additionalItems } = node
  if (additionalProperties !== undefined) {
    out.additionalProperties =
      typeof additionalProperties === "boolean"
        ? additionalProperties
        : translate(additionalProperties, [...at, "additionalProperties"])
  }
  if (Array.isArray(items)) {
    out.items = items.map((item, i) => translate(item, [...at, "items", i]))
  } else if (items !== undefined) {
    out.items = translate(items, [...at, "items"])
  }
  if (additionalItems !== undefined) {
    out.additionalItems =
      typeof additionalItems === "boolean"
        ? additionalItems
        : translate(additionalItems, [...at, "additionalItems"])
  }
  return out
}

interface Compiled {
  readonly schema: SchemaObject
  readonly validate: ValidateFunction
}

const compiled = new WeakMap<SchemaNode, Compiled>()

function compile(node: SchemaNode): Compiled {
  let entry = compiled.get(node)
  if (!entry) {
    const schema = translate(node, [])
    let validate: ValidateFunction
    try {
      validate = ajv.compile(schema)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new SchemaError(`${formatSchemaPath([])} cannot be compiled: ${reason}`)
    }
    entry = { schema, validate }
    compiled.set(node, entry)
  }
  return entry
}

function unescapeSegment(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~")
}

/** Segments of a JSON pointer; `fragment` pointers (`#/a%20b`) are URI-decoded first */
function pointerSegments(pointer: string, fragment = false): string[] {
  const raw = (fragment ? pointer.replace(/^#/, "") : pointer).split("/").slice(1)
  return raw.map((segment) => unescapeSegment(fragment ? decodeURIComponent(segment) : segment))
}

function childOf(node: unknown, segment: string): unknown {
  return isObject(node) ? Reflect.get(node, segment) : undefined
}

function toValuePath(instancePath: string, value: JSONValue): Item[] {
  const path: Item[] = []
  let node: JSONValue | undefined = value
  for (const segment of pointerSegments(instancePath)) {
    if (Array.isArray(node)) {
      const index = Number(segment)
      path.push(index)
      node = node[index]
    } else {
      path.push(segment)
      node = isRecord(node) ? node[segment] : undefined
    }
  }
  return path
}

function toSchemaPath(errorSchemaPath: string, schema: SchemaObject): Item[] {
  const path: Item[] = []
  let node: unknown = schema
  let nameNext = false
  for (const segment of pointerSegments(errorSchemaPath, true)) {
    if (Array.isArray(node)) {
      const index = Number(segment)
      path.push(index)
      node = node[index]
    } else {
      path.push(nameNext ? segment : (RENAMED_KEYWORDS[segment] ?? segment))
      nameNext = !nameNext && segment === "properties"
      node = childOf(node, segment)
    }
  }
  return path
}

function toValidationError(
  error: ErrorObject,
  value: JSONValue,
  schema: SchemaObject
): ValidationError {
  const valuePath = toValuePath(error.instancePath, value)
  const schemaPath = toSchemaPath(error.schemaPath, schema)
  const { missingProperty, additionalProperty, multipleOf } = error.params

  switch (error.keyword) {
    case "required":
      if (typeof missingProperty === "string") {
        return new ValidationError(
          "is missing and it is not optional",
          [...valuePath, missingProperty],
          [...schemaPath.slice(0, -1), "properties", missingProperty]
        )
      }
      break
    case "additionalProperties":
      if (typeof additionalProperty === "string") {
        const path = [...valuePath, additionalProperty]
        return new ValidationError("is not allowed here", path, schemaPath)
      }
      break
    case "anyOf":
      return new ValidationError("does not match any of the allowed types", valuePath, schemaPath)
    case "multipleOf":
      return new ValidationError(`must be divisible by ${multipleOf}`, valuePath, schemaPath)
  }
  return new ValidationError(error.message ?? `fails ${error.keyword}`, valuePath, schemaPath)
}

/**
 * Built-in validator for the JSON Schema draft-03 subset documents use, run through ajv.
 *
 * Properties that are missing but declare a `default` are not reported:
 * reading them through a fragment produces the default.
 *
 * @example
 * ```ts
 * validateValue(
 *   { name: "joe", age: "thirty two" },
 *   { type: "object", properties: { age: { type: "number" } } }
 * )?.schemaPath // "schema.properties.age.type"
 * ```
 */
export const validateValue: ValidateFn = (value, schema) => {
  const { schema: translated, validate } = compile(schema)
  if (validate(value)) {
    return null
  }
  // with allErrors off, the failing keyword is reported last (after any anyOf branch errors)
  const errors = validate.errors ?? []
  const error = errors[errors.length - 1]
  if (!error) {
    return new ValidationError("does not match the schema", [], [])
  }
  return toValidationError(error, value, translated)
}
