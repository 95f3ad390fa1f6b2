import { freeze } from "immer"
import type { Node } from "./node"
import { freezePath, type Path } from "./path"

/**
 * Whole document plus cursor at one moment. Immutable once created.
 */
export type Snapshot = {
  readonly root: Node
  readonly cursor: Path
}

/**
 * Creates a snapshot. `root` is deep frozen, which is what lets snapshots share
 * subtrees with the live tree instead of copying them.
 */
export function createSnapshot(root: Node, cursor: Path): Snapshot {
  return Object.freeze({ root: freeze(root, true), cursor: freezePath(cursor) })
}
