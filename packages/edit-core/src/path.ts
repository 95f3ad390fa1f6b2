import { childAt, type Node } from "./node"

/**
 * Location of a node, as the position taken at each level starting from the root.
 * For a mapping the index picks the Nth entry in insertion order (not a key),
 * for a sequence the Nth element. The empty path is the root.
 */
export type Path = readonly number[]

export const ROOT_PATH: Path = Object.freeze([])

/**
 * Copies a path into a frozen array, so that holding on to it never aliases a caller's array.
 */
export function freezePath(path: Path): Path {
  return Object.freeze(path.slice())
}

export function isValidPath(path: Path): boolean {
  return path.every((index) => Number.isInteger(index) && index >= 0)
}

export function pathsEqual(a: Path, b: Path): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * True if `ancestor` is a proper prefix of `path`.
 */
export function isAncestorPath(ancestor: Path, path: Path): boolean {
  if (ancestor.length >= path.length) return false
  for (let i = 0; i < ancestor.length; i++) {
    if (ancestor[i] !== path[i]) return false
  }
  return true
}

/**
 * Path of the parent, or undefined for the root.
 */
export function parentPath(path: Path): Path | undefined {
  return path.length === 0 ? undefined : freezePath(path.slice(0, -1))
}

/**
 * Position of the node within its parent, or undefined for the root.
 */
export function lastIndex(path: Path): number | undefined {
  return path.length === 0 ? undefined : path[path.length - 1]
}

export function childPath(path: Path, index: number): Path {
  return freezePath([...path, index])
}

/**
 * Walks `path` from `root`.
 * Running into a scalar, or an index past the end, yields undefined.
 */
export function resolvePath(root: Node, path: Path): Node | undefined {
  let current: Node = root
  for (const index of path) {
    const next = childAt(current.value, index)
    if (!next) return undefined
    current = next
  }
  return current
}

/**
 * Cursor fallback after a structural change: the same path if it still resolves,
 * otherwise the closest ancestor that does. Always ends at the root at worst.
 */
export function nearestExistingPath(root: Node, path: Path): Path {
  let candidate = path.slice()
  while (candidate.length > 0 && !resolvePath(root, candidate)) {
    candidate.pop()
  }
  return freezePath(candidate)
}

export type PathFormat = "dot" | "bracket"

/**
 * Renders a path with the keys it goes through.
 *
 * - `dot`: `.users[0].name` (the root is `.`)
 * - `bracket`: `$["users"][0]["name"]` (the root is `$`)
 *
 * Returns undefined if the path does not resolve.
 */
export function formatPath(root: Node, path: Path, format: PathFormat): string | undefined {
  if (path.length === 0) {
    return format === "dot" ? "." : "$"
  }

  let result = format === "bracket" ? "$" : ""
  let current = root

  for (const index of path) {
    const value = current.value
    if (value.kind === "mapping") {
      const entry = value.entries[index]
      if (!entry) return undefined
      result += format === "dot" ? `.${entry.key}` : `["${escapeKey(entry.key)}"]`
      current = entry.node
    } else {
      const next = childAt(value, index)
      if (!next) return undefined
      result += `[${index}]`
      current = next
    }
  }

  return result
}

function escapeKey(key: string): string {
  return key.replace(/["\\]/g, (ch) => `\\${ch}`)
}
