import equal from "fast-deep-equal"
import type { JSONContainer, JSONRecord, JSONValue } from "./json"

/**
 * Deep equality check for JSONValues.
 */
export function deepEqual(a: JSONValue, b: JSONValue): boolean {
  return equal(a, b)
}

/**
 * Checks if a value is an object (typeof === "object" && !== null).
 */
export function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object"
}

/**
 * Checks if a JSON value is a record (object but not array).
 */
export function isRecord(value: JSONValue | undefined): value is JSONRecord {
  return isObject(value) && !Array.isArray(value)
}

/**
 * Checks if a JSON value is a container (record or array).
 */
export function isContainer(value: JSONValue | undefined): value is JSONContainer {
  return isObject(value)
}

/**
 * Deep clone of a JSON value. Primitives are returned as-is.
 */
export function cloneJSON<T extends JSONValue>(value: T): T
export function cloneJSON(value: JSONValue): JSONValue {
  if (Array.isArray(value)) {
    return value.map((item) => cloneJSON(item))
  }
  if (isRecord(value)) {
    const clone: JSONRecord = {}
    const keys = Object.keys(value)
    for (let i = 0; i < keys.length; i++) {
      const key = keys[i]
      clone[key] = cloneJSON(value[key])
    }
    return clone
  }
  return value
}

/**
 * Human-readable kind of a JSON value, as used in error messages.
 */
export function describeKind(value: JSONValue | undefined): string {
  if (value === undefined) return "nothing"
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}
