import type { Path } from "./json"
import { formatSchemaPath, formatValuePath } from "./path"

export class FragmentDocError extends Error {
  constructor(msg: string) {
    super(msg)
    this.name = "FragmentDocError"

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, FragmentDocError.prototype)
  }
}

/**
 * Navigation into a value that is not a container, or with the wrong kind of item.
 */
export class TypeMismatchError extends FragmentDocError {
  constructor(
    readonly path: Path,
    msg: string
  ) {
    super(`${formatValuePath(path)}: ${msg}`)
    this.name = "TypeMismatchError"
    Object.setPrototypeOf(this, TypeMismatchError.prototype)
  }
}

/**
 * A missing key or index whose schema provides no default.
 */
export class NoSuchElementError extends FragmentDocError {
  constructor(readonly path: Path) {
    super(`${formatValuePath(path)} does not exist and has no default value`)
    this.name = "NoSuchElementError"
    Object.setPrototypeOf(this, NoSuchElementError.prototype)
  }
}

/**
 * A default value was requested from a schema that does not declare one.
 */
export class NoDefaultError extends FragmentDocError {
  constructor(readonly path: Path) {
    super(`${formatValuePath(path)} has no default value in its schema`)
    this.name = "NoDefaultError"
    Object.setPrototypeOf(this, NoDefaultError.prototype)
  }
}

/**
 * A mutation was attempted through a fragment that is no longer reachable from its document.
 */
export class OrphanedFragmentError extends FragmentDocError {
  constructor(readonly path: Path) {
    super(`Attempt to modify orphaned document fragment ${formatValuePath(path)}`)
    this.name = "OrphanedFragmentError"
    Object.setPrototypeOf(this, OrphanedFragmentError.prototype)
  }
}

export class UnsupportedOperationError extends FragmentDocError {
  constructor(
    readonly path: Path,
    msg: string
  ) {
    super(`${formatValuePath(path)}: ${msg}`)
    this.name = "UnsupportedOperationError"
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype)
  }
}

/**
 * The schema itself is malformed (bad keyword type, unknown fragment class, ...).
 */
export class SchemaError extends FragmentDocError {
  constructor(msg: string) {
    super(msg)
    this.name = "SchemaError"
    Object.setPrototypeOf(this, SchemaError.prototype)
  }
}

/**
 * A value does not conform to its schema.
 *
 * `valuePath` points at the offending value (`object.age`) and
 * `schemaPath` at the violated keyword (`schema.properties.age.type`).
 */
export class ValidationError extends FragmentDocError {
  readonly valuePath: string
  readonly schemaPath: string

  constructor(
    readonly detail: string,
    valuePath: Path,
    schemaPath: Path
  ) {
    super(`${formatValuePath(valuePath)}: ${detail} (${formatSchemaPath(schemaPath)})`)
    this.name = "ValidationError"
    this.valuePath = formatValuePath(valuePath)
    this.schemaPath = formatSchemaPath(schemaPath)
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}
