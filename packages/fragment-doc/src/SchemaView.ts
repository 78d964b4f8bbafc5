import { NoDefaultError, SchemaError } from "./error"
import type { Item, JSONValue, Path } from "./json"
import { formatSchemaPath } from "./path"
import { isObject } from "./utils"

/**
 * Primitive kinds a schema `type` can name. `any` matches every value.
 */
export type TypeTag =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "object"
  | "array"
  | "null"
  | "any"

export const TYPE_TAGS: readonly TypeTag[] = [
  "string",
  "number",
  "integer",
  "boolean",
  "object",
  "array",
  "null",
  "any",
]

/**
 * A JSON Schema (draft-03 flavour) node.
 */
export interface SchemaNode {
  type?: TypeTag | (TypeTag | SchemaNode)[]
  default?: JSONValue
  optional?: boolean
  properties?: { [name: string]: SchemaNode }
  additionalProperties?: SchemaNode | boolean
  items?: SchemaNode | SchemaNode[]
  additionalItems?: SchemaNode | boolean
  /** Tag of the fragment class to build for values described by this node */
  fragmentClass?: string
  title?: string
  description?: string

  enum?: JSONValue[]
  minimum?: number
  maximum?: number
  exclusiveMinimum?: boolean
  exclusiveMaximum?: boolean
  divisibleBy?: number
  minLength?: number
  maxLength?: number
  pattern?: string
  minItems?: number
  maxItems?: number
  uniqueItems?: boolean
}

export function isTypeTag(value: unknown): value is TypeTag {
  return typeof value === "string" && TYPE_TAGS.some((tag) => tag === value)
}

/**
 * Checks that a value can be used as a schema node (a non-array object).
 */
export function isSchemaNode(value: unknown): value is SchemaNode {
  return isObject(value) && !Array.isArray(value)
}

/**
 * Narrows an `additionalProperties` / `additionalItems` keyword to the schema it holds, if any.
 */
function asSubSchema(value: SchemaNode | boolean | undefined): SchemaNode | undefined {
  return typeof value === "boolean" ? undefined : value
}

const views = new WeakMap<SchemaNode, SchemaView>()

/**
 * Read-only navigation and queries over a schema node, independent of any document.
 *
 * Views are cached per node, so `SchemaView.of(node) === SchemaView.of(node)`.
 * Keywords are checked when they are read; a malformed keyword throws a `SchemaError`.
 */
export class SchemaView {
  private _declaredTypes?: ReadonlySet<TypeTag>

  /** View over the empty schema, which accepts anything and declares nothing */
  static readonly empty: SchemaView = new SchemaView({})

  private constructor(readonly node: SchemaNode) {}

  static of(node: SchemaNode): SchemaView {
    let view = views.get(node)
    if (!view) {
      if (!isSchemaNode(node)) {
        throw new SchemaError(`Schema must be an object, got ${JSON.stringify(node)}`)
      }
      view = new SchemaView(node)
      views.set(node, view)
    }
    return view
  }

  get title(): string | undefined {
    return this.stringKeyword("title")
  }

  get description(): string | undefined {
    return this.stringKeyword("description")
  }

  get hasDefault(): boolean {
    return Object.hasOwn(this.node, "default") && this.node.default !== undefined
  }

  /**
   * The declared default. Callers that store it must copy it first.
   */
  getDefault(path: Path = []): JSONValue {
    const value = this.node.default
    if (value === undefined || !this.hasDefault) {
      throw new NoDefaultError(path)
    }
    return value
  }

  get isOptional(): boolean {
    const optional = this.node.optional
    if (optional === undefined) return false
    if (typeof optional !== "boolean") {
      throw new SchemaError(`${formatSchemaPath(["optional"])} must be a boolean`)
    }
    return optional
  }

  /**
   * Allowed type tags. A missing `type` means `any`; union schemas inside a
   * `type` list contribute their own declared types.
   */
  get declaredTypes(): ReadonlySet<TypeTag> {
    if (!this._declaredTypes) {
      this._declaredTypes = this.computeDeclaredTypes()
    }
    return this._declaredTypes
  }

  get fragmentClass(): string | undefined {
    return this.stringKeyword("fragmentClass")
  }

  get properties(): Readonly<Record<string, SchemaNode>> {
    const properties = this.node.properties
    if (properties === undefined) return {}
    if (!isSchemaNode(properties)) {
      throw new SchemaError(`${formatSchemaPath(["properties"])} must be an object`)
    }
    return properties
  }

  /**
   * Schema for the child reached through `item`.
   *
   * String items resolve against `properties` then `additionalProperties`;
   * number items against `items` (positional when it is a list) then
   * `additionalItems`. Anything unresolved falls back to the empty schema.
   */
  childSchema(item: Item): SchemaView {
    const child = typeof item === "string" ? this.propertySchema(item) : this.itemSchema(item)
    return child ? SchemaView.of(child) : SchemaView.empty
  }

  private propertySchema(key: string): SchemaNode | undefined {
    const properties = this.properties
    if (Object.hasOwn(properties, key)) {
      return properties[key]
    }
    return asSubSchema(this.node.additionalProperties)
  }

  private itemSchema(index: number): SchemaNode | undefined {
    const items = this.node.items
    if (Array.isArray(items)) {
      if (index >= 0 && index < items.length) {
        return items[index]
      }
      return asSubSchema(this.node.additionalItems)
    }
    return items
  }

  private computeDeclaredTypes(): ReadonlySet<TypeTag> {
    const type = this.node.type
    const types = new Set<TypeTag>()
    if (type === undefined) {
      types.add("any")
      return types
    }
    const alternatives: (TypeTag | SchemaNode)[] = Array.isArray(type) ? type : [type]
    alternatives.forEach((alternative, i) => {
      if (isTypeTag(alternative)) {
        types.add(alternative)
      } else if (isSchemaNode(alternative)) {
        for (const nested of SchemaView.of(alternative).declaredTypes) {
          types.add(nested)
        }
      } else {
        const at = Array.isArray(type) ? ["type", i] : ["type"]
        throw new SchemaError(
          `${formatSchemaPath(at)} is not a known type: ${JSON.stringify(alternative)}`
        )
      }
    })
    if (types.size === 0) {
      types.add("any")
    }
    return types
  }

  private stringKeyword(keyword: "title" | "description" | "fragmentClass"): string | undefined {
    const value = this.node[keyword]
    if (value !== undefined && typeof value !== "string") {
      throw new SchemaError(`${formatSchemaPath([keyword])} must be a string`)
    }
    return value
  }
}
