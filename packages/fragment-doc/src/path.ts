import type { Path } from "./json"

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

/**
 * Renders a path as an accessor expression rooted at `root`,
 * e.g. `object.users[0]["first name"]`.
 */
export function formatPath(root: string, path: Path): string {
  let out = root
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`
    } else if (IDENTIFIER.test(segment)) {
      out += `.${segment}`
    } else {
      out += `[${JSON.stringify(segment)}]`
    }
  }
  return out
}

/**
 * Renders a path to a value inside a document.
 */
export function formatValuePath(path: Path): string {
  return formatPath("object", path)
}

/**
 * Renders a path to a keyword inside a schema.
 */
export function formatSchemaPath(path: Path): string {
  return formatPath("schema", path)
}
