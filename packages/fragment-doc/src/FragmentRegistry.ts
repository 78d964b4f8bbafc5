import { SchemaError } from "./error"
import type { FragmentClass } from "./Fragment"
import type { SchemaView } from "./SchemaView"

/**
 * Maps the `fragmentClass` tags used in schemas to fragment classes.
 *
 * A tag only affects the node that declares it: children of a custom
 * fragment are plain fragments unless their own schema says otherwise.
 */
export class FragmentRegistry {
  private readonly classes: ReadonlyMap<string, FragmentClass>

  constructor(classes: Readonly<Record<string, FragmentClass>> = {}) {
    this.classes = new Map(Object.entries(classes))
  }

  /**
   * Class to build for values described by `schema`, or `undefined` when the
   * schema does not ask for one.
   * Throws a `SchemaError` for tags nobody registered.
   */
  resolve(schema: SchemaView): FragmentClass | undefined {
    const tag = schema.fragmentClass
    if (tag === undefined) {
      return undefined
    }
    const fragmentClass = this.classes.get(tag)
    if (!fragmentClass) {
      throw new SchemaError(`Unknown fragment class "${tag}"`)
    }
    return fragmentClass
  }
}
