import { freeze } from "immer"
import type { Document, DocumentChange } from "./Document"
import {
  NoSuchElementError,
  OrphanedFragmentError,
  TypeMismatchError,
  UnsupportedOperationError,
  ValidationError,
} from "./error"
import type { FragmentRegistry } from "./FragmentRegistry"
import type { Item, JSONContainer, JSONValue, Path } from "./json"
import type { SchemaView } from "./SchemaView"
import type { ValidateFn } from "./validator"
import { childSlot, type Slot, type ValueStore } from "./ValueStore"
import { cloneJSON, deepEqual, describeKind, isContainer, isRecord } from "./utils"

/**
 * State shared by every fragment of one document.
 */
export interface DocumentContext {
  readonly store: ValueStore
  readonly registry: FragmentRegistry
  readonly validate: ValidateFn
  emit(change: DocumentChange): void
}

/**
 * Everything a fragment needs to be constructed.
 * Built by the parent fragment (or the document for the root); subclasses
 * pass it through to `super` untouched.
 */
export interface FragmentInit {
  readonly context: DocumentContext
  readonly document: Document | null
  readonly parent: Fragment | null
  readonly slot: Slot
  readonly path: Path
  readonly schema: SchemaView
}

/**
 * Constructor of a fragment class, as registered for a `fragmentClass` schema tag.
 */
export type FragmentClass<F extends Fragment = Fragment> = new (init: FragmentInit) => F

/** What an orphaned fragment keeps once it is cut off from its document */
interface Snapshot {
  readonly value: JSONValue
  readonly isDefault: boolean
}

/**
 * A path-addressed, schema-aware view onto one node of a document.
 *
 * While attached, `value` is the very node stored in the document (aliased,
 * not copied), so in-place changes are visible through both. Values missing
 * from the document are synthesized from the schema `default`, which is
 * copied into the document the first time it is read.
 *
 * A fragment becomes orphaned when its slot, or the slot of any ancestor, is
 * replaced through another fragment. Orphans keep a frozen deep copy of the
 * last value they saw: reads keep working, mutations throw
 * `OrphanedFragmentError`.
 *
 * Fragments are not cached; every `get` builds a fresh instance.
 */
export class Fragment {
  protected _document: Document | null
  private _parent: Fragment | null
  private readonly _context: DocumentContext
  private readonly _slot: Slot
  private readonly _path: Path
  private readonly _schema: SchemaView

  /** Version of our own slot when we last attached to it */
  private _version: number
  /** Version of the parent fragment when we were created */
  private readonly _parentVersion: number

  private _lastSeen: JSONValue | undefined
  private _lastIsDefault: boolean
  private _snapshot: Snapshot | null = null

  constructor(init: FragmentInit) {
    this._document = init.document
    this._parent = init.parent
    this._context = init.context
    this._slot = init.slot
    this._path = init.path
    this._schema = init.schema

    const store = init.context.store
    this._version = store.version(init.slot)
    this._parentVersion = init.parent ? init.parent._version : 0
    this._lastSeen = store.read(init.slot)
    this._lastIsDefault = this.holdsDefault()
  }

  // --- Identity ---

  /**
   * The document this fragment belongs to, or `null` once orphaned.
   */
  get document(): Document | null {
    this.checkAttached()
    return this._document
  }

  /**
   * The fragment this one was reached from, or `null` for the document root
   * and for orphans. `parent.get(item)` addresses the same value as this fragment.
   */
  get parent(): Fragment | null {
    this.checkAttached()
    return this._parent
  }

  /**
   * The key or index used to reach this fragment from its parent, `null` for the root.
   */
  get item(): Item | null {
    return this._slot.kind === "root" ? null : this._slot.item
  }

  get path(): Path {
    return this._path
  }

  get schema(): SchemaView {
    return this._schema
  }

  get isOrphaned(): boolean {
    return !this.checkAttached()
  }

  /**
   * True when the value exposed was synthesized from the schema default and
   * never explicitly written. A written value equal to the default is not default.
   */
  get isDefault(): boolean {
    if (!this.checkAttached()) {
      return this.snapshot().isDefault
    }
    const store = this._context.store
    return store.has(this._slot) ? this.holdsDefault() : this._schema.hasDefault
  }

  /**
   * A copy of the schema default. Throws `NoDefaultError` when there is none.
   */
  get defaultValue(): JSONValue {
    return cloneJSON(this._schema.getDefault(this._path))
  }

  get defaultValueExists(): boolean {
    return this._schema.hasDefault
  }

  // --- Value ---

  get value(): JSONValue {
    if (!this.checkAttached()) {
      return this.snapshot().value
    }
    return this.resolveValue()
  }

  /**
   * Replaces the value at this fragment's path.
   *
   * Other fragments at this path or below are orphaned; this one stays attached.
   * Assigning a value deep-equal to the current (non-default) one does nothing.
   */
  set value(newValue: JSONValue) {
    this.assertAttached()
    const stored = this.replace(this._slot, this._path, newValue)
    if (stored === undefined) {
      return
    }
    this._version = this._context.store.version(this._slot)
    this._lastSeen = stored
    this._lastIsDefault = false
    this._parent?.markReal()
    this._context.emit({ kind: "set", path: this._path, value: stored })
  }

  // --- Navigation ---

  /**
   * Returns a fragment for a child of this object or array.
   *
   * A missing child whose schema declares a default gets a copy of that
   * default written into the document now.
   */
  get(item: Item): Fragment {
    this.assertAttached()
    const container = this.resolveContainer()
    const path = this.childPath(container, item)
    const slot = childSlot(container, item)
    const schema = this._schema.childSchema(item)
    const store = this._context.store
    // throws SchemaError for unknown tags, before anything is materialized
    const fragmentClass: FragmentClass = this._context.registry.resolve(schema) ?? Fragment

    if (!store.has(slot)) {
      if (!schema.hasDefault) {
        throw new NoSuchElementError(path)
      }
      store.materialize(slot, cloneJSON(schema.getDefault(path)), path)
    }

    return new fragmentClass({
      context: this._context,
      document: this._document,
      parent: this,
      slot,
      path,
      schema,
    })
  }

  /**
   * Follows a path of items from this fragment.
   */
  getIn(path: Path): Fragment {
    let fragment: Fragment = this
    for (const item of path) {
      fragment = fragment.get(item)
    }
    return fragment
  }

  /**
   * Like `get`, but checks the child was built with the given fragment class.
   */
  getAs<F extends Fragment>(item: Item, fragmentClass: FragmentClass<F>): F {
    const fragment = this.get(item)
    if (!(fragment instanceof fragmentClass)) {
      throw new TypeMismatchError(
        fragment.path,
        `expected a ${fragmentClass.name} fragment, got ${fragment.constructor.name}`
      )
    }
    return fragment
  }

  /**
   * Writes a child of this object or array, creating it when absent.
   * Equivalent to `fragment.get(item).value = newValue`, but also works for
   * missing children that have no default.
   */
  set(item: Item, newValue: JSONValue): void {
    this.assertAttached()
    const container = this.resolveContainer()
    const path = this.childPath(container, item)
    const stored = this.replace(childSlot(container, item), path, newValue)
    if (stored === undefined) {
      return
    }
    this.markReal()
    this._context.emit({ kind: "set", path, value: stored })
  }

  /**
   * Discards the current value so the schema default shows through again.
   *
   * Object members are deleted from their container, the root is made absent.
   * Array items cannot fall back to a default without shifting their
   * siblings, so they throw `UnsupportedOperationError`.
   */
  revertToDefault(): void {
    this.assertAttached()
    // throws NoDefaultError
    this._schema.getDefault(this._path)

    const slot = this._slot
    if (slot.kind === "child" && Array.isArray(slot.container)) {
      throw new UnsupportedOperationError(this._path, "array items cannot be reverted to default")
    }

    const store = this._context.store
    if (!store.has(slot) || this.holdsDefault()) {
      return
    }
    store.remove(slot)
    this._version = store.version(slot)
    this._context.emit({ kind: "revert", path: this._path })
  }

  // --- Validation ---

  /**
   * Checks the value against this fragment's schema.
   */
  validate(): ValidationError | null {
    return this._context.validate(this.value, this._schema.node)
  }

  /**
   * Like `validate`, but throws the `ValidationError`.
   */
  assertValid(): void {
    const error = this.validate()
    if (error) {
      throw error
    }
  }

  // --- Container conveniences ---

  /**
   * Number of keys (objects), elements (arrays) or code points (strings).
   */
  get length(): number {
    const value = this.value
    if (typeof value === "string") return Array.from(value).length
    if (Array.isArray(value)) return value.length
    if (isRecord(value)) return Object.keys(value).length
    throw new TypeMismatchError(this._path, `${describeKind(value)} has no length`)
  }

  /**
   * Key presence for objects, (deep-equal) element presence for arrays,
   * substring presence for strings.
   */
  has(member: JSONValue): boolean {
    const value = this.value
    if (typeof value === "string") {
      return typeof member === "string" && value.includes(member)
    }
    if (Array.isArray(value)) {
      return value.some((element) => deepEqual(element, member))
    }
    if (isRecord(value)) {
      return typeof member === "string" && Object.hasOwn(value, member)
    }
    throw new TypeMismatchError(this._path, `cannot look for members in ${describeKind(value)}`)
  }

  /**
   * Keys (objects, in insertion order) or indices (arrays) of the children.
   */
  keys(): IterableIterator<Item> {
    const value = this.value
    if (Array.isArray(value)) {
      return indices(value)
    }
    if (isRecord(value)) {
      return Object.keys(value)[Symbol.iterator]()
    }
    throw new TypeMismatchError(this._path, `${describeKind(value)} is not iterable`)
  }

  /**
   * Iterates over child fragments, lazily.
   */
  *[Symbol.iterator](): IterableIterator<Fragment> {
    for (const item of this.keys()) {
      yield this.get(item)
    }
  }

  // --- Internals ---

  /**
   * Detects (and records) orphaning.
   * @returns true if the fragment is still attached to its document.
   */
  protected checkAttached(): boolean {
    if (this._snapshot) {
      return false
    }
    if (this.isReachable()) {
      return true
    }
    this.orphan()
    return false
  }

  protected assertAttached(): void {
    if (!this.checkAttached()) {
      throw new OrphanedFragmentError(this._path)
    }
  }

  private isReachable(): boolean {
    const slot = this._slot
    if (slot.kind === "root") {
      return true
    }
    const parent = this._parent
    if (!parent || !parent.checkAttached() || parent._version !== this._parentVersion) {
      return false
    }
    if (parent.peek() !== slot.container) {
      return false
    }
    const store = this._context.store
    if (store.version(slot) !== this._version) {
      return false
    }
    // deleted in place through an aliased ancestor value, with nothing to fall back to
    return store.has(slot) || this._schema.hasDefault
  }

  private orphan(): Snapshot {
    const snapshot: Snapshot = {
      value: freeze(cloneJSON(this._lastSeen ?? null), true),
      isDefault: this._lastIsDefault,
    }
    this._snapshot = snapshot
    this._document = null
    this._parent = null
    return snapshot
  }

  private snapshot(): Snapshot {
    return this._snapshot ?? this.orphan()
  }

  /** Current stored value, without materializing defaults */
  private peek(): JSONValue | undefined {
    return this._context.store.read(this._slot)
  }

  private resolveValue(): JSONValue {
    const store = this._context.store
    let value = store.read(this._slot)
    if (value === undefined) {
      value = cloneJSON(this._schema.getDefault(this._path))
      store.materialize(this._slot, value, this._path)
    }
    this._lastSeen = value
    this._lastIsDefault = this.holdsDefault()
    return value
  }

  private resolveContainer(): JSONContainer {
    const value = this.resolveValue()
    if (!isContainer(value)) {
      throw new TypeMismatchError(
        this._path,
        `${describeKind(value)} is not an object or array and has no children`
      )
    }
    return value
  }

  private childPath(container: JSONContainer, item: Item): Path {
    const path = [...this._path, item]
    if (Array.isArray(container)) {
      if (typeof item !== "number") {
        throw new TypeMismatchError(this._path, `arrays are indexed by numbers, got "${item}"`)
      }
      if (!Number.isInteger(item) || item < 0) {
        throw new NoSuchElementError(path)
      }
    } else if (typeof item !== "string") {
      throw new TypeMismatchError(this._path, `objects are indexed by strings, got ${item}`)
    }
    return path
  }

  /**
   * Writes a value into a slot unless it already holds an equal real value.
   * Containers are copied, so no node is ever shared by two slots.
   * @returns the value now stored, or `undefined` if the store did not change.
   */
  private replace(slot: Slot, path: Path, newValue: JSONValue): JSONValue | undefined {
    const store = this._context.store
    const current = store.read(slot)
    if (current !== undefined && !store.isDefault(slot) && deepEqual(current, newValue)) {
      return undefined
    }
    const stored = isContainer(newValue) ? cloneJSON(newValue) : newValue
    store.write(slot, stored, path)
    return stored
  }

  /**
   * True when this fragment's slot holds a materialized default that has not
   * been changed since, neither through a fragment nor in place.
   */
  private holdsDefault(): boolean {
    const store = this._context.store
    const value = store.read(this._slot)
    if (value === undefined || !store.isDefault(this._slot) || !this._schema.hasDefault) {
      return false
    }
    return matchesDefault(store, value, this._schema.getDefault(this._path), this._schema)
  }

  /**
   * Clears the default mark of this fragment's slot and of all its ancestors,
   * once something below them has been written explicitly.
   */
  private markReal(): void {
    this._context.store.markReal(this._slot)
    this._parent?.markReal()
  }
}

/**
 * Compares a stored value with the default it was materialized from.
 * Members the default lacks only match when they are themselves materialized
 * defaults of their own schema.
 */
function matchesDefault(
  store: ValueStore,
  value: JSONValue,
  defaultValue: JSONValue,
  schema: SchemaView
): boolean {
  if (deepEqual(value, defaultValue)) {
    return true
  }
  if (Array.isArray(value) && Array.isArray(defaultValue)) {
    const list = value
    const defaults = defaultValue
    if (list.length < defaults.length) {
      return false
    }
    return list.every((element, i) =>
      i < defaults.length
        ? matchesDefault(store, element, defaults[i], schema.childSchema(i))
        : matchesAddedDefault(store, list, i, schema.childSchema(i))
    )
  }
  if (isRecord(value) && isRecord(defaultValue)) {
    const record = value
    const defaults = defaultValue
    if (Object.keys(defaults).some((key) => !Object.hasOwn(record, key))) {
      return false
    }
    return Object.keys(record).every((key) =>
      Object.hasOwn(defaults, key)
        ? matchesDefault(store, record[key], defaults[key], schema.childSchema(key))
        : matchesAddedDefault(store, record, key, schema.childSchema(key))
    )
  }
  return false
}

function matchesAddedDefault(
  store: ValueStore,
  container: JSONContainer,
  item: Item,
  schema: SchemaView
): boolean {
  const slot = childSlot(container, item)
  const value = store.read(slot)
  if (value === undefined || !store.isDefault(slot) || !schema.hasDefault) {
    return false
  }
  return matchesDefault(store, value, schema.getDefault(), schema)
}

function* indices(array: readonly JSONValue[]): IterableIterator<number> {
  for (let i = 0; i < array.length; i++) {
    yield i
  }
}
