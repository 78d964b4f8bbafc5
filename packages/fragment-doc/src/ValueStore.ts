import { NoSuchElementError } from "./error"
import type { Item, JSONContainer, JSONValue, Path } from "./json"

/**
 * The place a value lives: either the document root, or an item of a container.
 */
export type Slot = RootSlot | ChildSlot

export interface RootSlot {
  readonly kind: "root"
}

export interface ChildSlot {
  readonly kind: "child"
  readonly container: JSONContainer
  readonly item: Item
}

export const ROOT_SLOT: RootSlot = { kind: "root" }

export function childSlot(container: JSONContainer, item: Item): ChildSlot {
  return { kind: "child", container, item }
}

/**
 * Owner of a document's value tree.
 *
 * Besides the values themselves it tracks, per slot:
 * - a structural version, bumped every time the slot is replaced or removed.
 *   Versions are drawn from the document revision, so they only ever grow and
 *   a slot that is re-created after a replacement never reuses an old version.
 * - whether the slot holds a materialized schema default rather than a value
 *   that was explicitly written.
 *
 * Bookkeeping is keyed by container identity (WeakMaps), so dropping a
 * subtree from the tree drops its bookkeeping with it.
 */
export class ValueStore {
  private _root: JSONValue | undefined
  private _rootVersion = 0
  private _rootIsDefault = false

  /** Incremented on every replacement/removal */
  private _revision = 0

  private readonly slotVersions = new WeakMap<JSONContainer, Map<Item, number>>()
  private readonly defaultSlots = new WeakMap<JSONContainer, Set<Item>>()

  /**
   * @param root Initial root value; `undefined` leaves the root absent.
   */
  constructor(root: JSONValue | undefined) {
    this._root = root
  }

  get root(): JSONValue | undefined {
    return this._root
  }

  get revision(): number {
    return this._revision
  }

  has(slot: Slot): boolean {
    return this.read(slot) !== undefined
  }

  /**
   * Reads the value in a slot, or `undefined` if the slot is absent.
   * Never materializes anything.
   */
  read(slot: Slot): JSONValue | undefined {
    if (slot.kind === "root") {
      return this._root
    }
    const { container, item } = slot
    if (Array.isArray(container)) {
      if (typeof item !== "number" || item < 0 || item >= container.length) {
        return undefined
      }
      return container[item]
    }
    if (typeof item !== "string" || !Object.hasOwn(container, item)) {
      return undefined
    }
    return container[item]
  }

  version(slot: Slot): number {
    if (slot.kind === "root") {
      return this._rootVersion
    }
    return this.slotVersions.get(slot.container)?.get(slot.item) ?? 0
  }

  isDefault(slot: Slot): boolean {
    if (slot.kind === "root") {
      return this._rootIsDefault
    }
    return this.defaultSlots.get(slot.container)?.has(slot.item) ?? false
  }

  /**
   * Replaces the value in a slot (creating the slot if absent).
   * Bumps the slot version and the revision and clears the default mark.
   *
   * @param path Path of the slot, used for error reporting only.
   */
  write(slot: Slot, value: JSONValue, path: Path): void {
    this.put(slot, value, path)
    this.bump(slot)
    this.setDefaultMark(slot, false)
  }

  /**
   * Stores a (copied) schema default into an absent slot and marks it as default.
   * This is not a replacement: versions and revision are left alone.
   */
  materialize(slot: Slot, value: JSONValue, path: Path): void {
    this.put(slot, value, path)
    this.setDefaultMark(slot, true)
  }

  /**
   * Removes a slot entirely (deletes the key, or makes the root absent).
   * Bumps the slot version and the revision.
   */
  remove(slot: Slot): void {
    if (slot.kind === "root") {
      this._root = undefined
    } else {
      const { container, item } = slot
      if (!Array.isArray(container) && typeof item === "string") {
        delete container[item]
      }
    }
    this.bump(slot)
    this.setDefaultMark(slot, false)
  }

  /**
   * Records that a slot now holds real data (a descendant was explicitly written).
   */
  markReal(slot: Slot): void {
    this.setDefaultMark(slot, false)
  }

  private put(slot: Slot, value: JSONValue, path: Path): void {
    if (slot.kind === "root") {
      this._root = value
      return
    }
    const { container, item } = slot
    if (Array.isArray(container)) {
      // arrays may only grow by appending, never with holes
      if (typeof item !== "number" || !Number.isInteger(item) || item < 0) {
        throw new NoSuchElementError(path)
      }
      if (item > container.length) {
        throw new NoSuchElementError(path)
      }
      container[item] = value
    } else {
      if (typeof item !== "string") {
        throw new NoSuchElementError(path)
      }
      container[item] = value
    }
  }

  private bump(slot: Slot): void {
    const next = ++this._revision
    if (slot.kind === "root") {
      this._rootVersion = next
      return
    }
    let versions = this.slotVersions.get(slot.container)
    if (!versions) {
      versions = new Map()
      this.slotVersions.set(slot.container, versions)
    }
    versions.set(slot.item, next)
  }

  private setDefaultMark(slot: Slot, isDefault: boolean): void {
    if (slot.kind === "root") {
      this._rootIsDefault = isDefault
      return
    }
    let marks = this.defaultSlots.get(slot.container)
    if (!marks) {
      if (!isDefault) return
      marks = new Set()
      this.defaultSlots.set(slot.container, marks)
    }
    if (isDefault) {
      marks.add(slot.item)
    } else {
      marks.delete(slot.item)
    }
  }
}
