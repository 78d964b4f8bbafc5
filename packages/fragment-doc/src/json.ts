/**
 * A key (objects) or index (arrays) used to step from a container to one of its children.
 */
export type Item = string | number

/**
 * A path from the document root to a value.
 * String segments address object keys, number segments address array indices.
 */
export type Path = readonly Item[]

/**
 * A JSON primitive.
 */
export type JSONPrimitive = null | boolean | number | string

/**
 * A JSON record.
 */
export type JSONRecord = { [k: string]: JSONValue }

/**
 * A JSON container (object or array).
 */
export type JSONContainer = JSONRecord | JSONValue[]

/**
 * A JSON value.
 */
export type JSONValue = JSONPrimitive | JSONContainer
