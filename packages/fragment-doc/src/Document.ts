import { SchemaError } from "./error"
import { Fragment, type DocumentContext, type FragmentClass } from "./Fragment"
import { FragmentRegistry } from "./FragmentRegistry"
import type { JSONValue, Path } from "./json"
import { isSchemaNode, type SchemaNode, SchemaView } from "./SchemaView"
import { type ValidateFn, validateValue } from "./validator"
import { ROOT_SLOT, ValueStore } from "./ValueStore"

/**
 * A change made to a document through one of its fragments.
 */
export type DocumentChange =
  | { kind: "set"; path: Path; value: JSONValue }
  | { kind: "revert"; path: Path }

export interface DocumentOptions {
  /**
   * Schema of the whole document.
   * Default: `{ type: "any" }`.
   */
  schema?: SchemaNode

  /**
   * Fragment classes, keyed by the tag schemas refer to in `fragmentClass`.
   */
  fragmentClasses?: Readonly<Record<string, FragmentClass>>

  /**
   * Validator used by `validate()` on the document and all of its fragments.
   * Default: the built-in draft-03 validator.
   */
  validate?: ValidateFn
}

/**
 * The root fragment. Owns the value tree and the root schema.
 *
 * When no initial value is given the root starts out absent: it reads as the
 * schema default if there is one, and as `{}` otherwise. An explicit `null`
 * is kept as `null`.
 */
export class Document extends Fragment {
  private readonly subscribers: Set<(change: DocumentChange) => void>
  private readonly store: ValueStore

  constructor(value?: JSONValue, options: DocumentOptions = {}) {
    const { schema = { type: "any" }, fragmentClasses = {}, validate = validateValue } = options
    if (!isSchemaNode(schema)) {
      throw new SchemaError(`Document schema must be an object, got ${JSON.stringify(schema)}`)
    }
    const view = SchemaView.of(schema)

    const subscribers = new Set<(change: DocumentChange) => void>()
    const store = new ValueStore(value === undefined && !view.hasDefault ? {} : value)
    const context: DocumentContext = {
      store,
      registry: new FragmentRegistry(fragmentClasses),
      validate,
      emit(change) {
        for (const sub of subscribers) {
          sub(change)
        }
      },
    }

    super({ context, document: null, parent: null, slot: ROOT_SLOT, path: [], schema: view })
    this._document = this
    this.subscribers = subscribers
    this.store = store
  }

  /**
   * Increases with every replacement or revert made through any fragment.
   * Only meaningful for comparing two readings of the same document instance.
   */
  get revision(): number {
    return this.store.revision
  }

  /**
   * Subscribes to changes.
   * @returns a function that removes the subscription.
   */
  subscribe(callback: (change: DocumentChange) => void): () => void {
    this.subscribers.add(callback)
    return () => {
      this.subscribers.delete(callback)
    }
  }
}
