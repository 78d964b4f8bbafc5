import type { Fragment } from "./Fragment"
import type { JSONValue } from "./json"

/**
 * How a bridged attribute delegates to its fragment:
 * - `fragment`: the child fragment itself
 * - `readonly`: the child's value
 * - `readwrite`: the child's value, assignable
 */
export type BridgeMode = "fragment" | "readonly" | "readwrite"

/**
 * One bridged attribute: a mode (the key is the attribute name) or an explicit key and mode.
 */
export type BridgeEntry = BridgeMode | { readonly key: string; readonly mode: BridgeMode }

export type BridgeSpec = Readonly<Record<string, BridgeEntry>>

type ModeOf<E extends BridgeEntry> = E extends BridgeMode
  ? E
  : E extends { mode: infer M }
    ? M
    : never

type NamesWithMode<S extends BridgeSpec, M extends BridgeMode> = {
  [K in keyof S]: ModeOf<S[K]> extends M ? K : never
}[keyof S]

/**
 * Object produced by `createBridge`.
 */
export type Bridge<S extends BridgeSpec> = {
  readonly [K in NamesWithMode<S, "fragment">]: Fragment
} & {
  readonly [K in NamesWithMode<S, "readonly">]: JSONValue
} & {
  [K in NamesWithMode<S, "readwrite">]: JSONValue
}

function normalizeEntry(entry: BridgeEntry, name: string): { key: string; mode: BridgeMode } {
  return typeof entry === "string" ? { key: name, mode: entry } : entry
}

/**
 * Builds an object with named accessors over the children of an object fragment.
 *
 * @example
 * ```ts
 * const settings = createBridge(doc, {
 *   saveOnExit: { key: "save_on_exit", mode: "readwrite" },
 *   theme: "fragment",
 * })
 * settings.saveOnExit = false // doc.set("save_on_exit", false)
 * settings.theme.get("name")  // doc.get("theme").get("name")
 * ```
 */
export function createBridge<S extends BridgeSpec>(fragment: Fragment, spec: S): Bridge<S> {
  const bridge = {}
  for (const name of Object.keys(spec)) {
    const { key, mode } = normalizeEntry(spec[name], name)
    const descriptor: PropertyDescriptor = { enumerable: true }
    if (mode === "fragment") {
      descriptor.get = () => fragment.get(key)
    } else {
      descriptor.get = () => fragment.get(key).value
    }
    if (mode === "readwrite") {
      descriptor.set = (newValue: JSONValue) => {
        fragment.set(key, newValue)
      }
    }
    Object.defineProperty(bridge, name, descriptor)
  }
  return bridge as Bridge<S>
}
