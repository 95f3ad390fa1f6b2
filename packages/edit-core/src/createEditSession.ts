import { DocumentTree, type DeleteOptions } from "./DocumentTree"
import { EditCoreError, OK, usageFailure, type EditResult } from "./error"
import { HistoryTree } from "./HistoryTree"
import { isScalar, stringValue, type Node, type ScalarValue } from "./node"
import { childPath, freezePath, nearestExistingPath, ROOT_PATH, type Path } from "./path"
import type { Snapshot } from "./snapshot"

/**
 * What caused a session change.
 */
export type ChangeCause = "edit" | "undo" | "redo" | "jump" | "cursor"

export interface EditSessionOptions {
  /**
   * Root of the loaded document.
   */
  root: Node

  /**
   * Initial cursor. Falls back to the closest existing ancestor.
   * Default: the root.
   */
  cursor?: Path

  /**
   * Maximum number of retained history states.
   * Default: 50
   */
  undoLimit?: number
}

export interface EditSessionController {
  /**
   * Returns the live tree. Undo and redo swap in a different instance, so do not keep it around.
   */
  getTree(): DocumentTree

  /**
   * Returns the cursor path.
   */
  getCursor(): Path

  /**
   * Moves the cursor. Returns false (and does not move) if nothing is at `path`.
   */
  setCursor(path: Path): boolean

  /**
   * Returns the undo history, for display and explicit traversal.
   */
  getHistory(): HistoryTree

  /**
   * True if the live document differs from the one the session was opened with.
   */
  isModified(): boolean

  /**
   * Subscribes to changes of the tree or cursor.
   */
  subscribe(callback: (tree: DocumentTree, cursor: Path, cause: ChangeCause) => void): () => void

  /**
   * Runs a compound edit as one undo step.
   * The pre-edit state is checkpointed only if the recipe succeeds and changed the tree;
   * if it fails, every change it made is rolled back.
   * `cursor` is where the cursor goes afterwards (default: where it is).
   */
  edit(recipe: (tree: DocumentTree) => EditResult, cursor?: Path): EditResult

  /**
   * Inserts a node and moves the cursor onto it.
   */
  insert(parentPath: Path, position: number, node: Node, key?: string): EditResult

  /**
   * Deletes the node at `path` (default: the cursor). The cursor stays on the same path
   * if it still resolves, otherwise on its closest existing ancestor.
   */
  delete(path?: Path, options?: DeleteOptions): EditResult

  /**
   * Replaces the node at `path`.
   */
  replace(path: Path, node: Node): EditResult

  /**
   * Changes the value of a scalar in place, keeping anchor and span.
   * A string replacing a string keeps the old one's style (plain, literal or folded);
   * write through the tree's `readWrite(path)` inside `edit` to change the style itself.
   */
  setScalar(path: Path, value: ScalarValue): EditResult

  /**
   * Renames the mapping entry at `path`.
   */
  renameKey(path: Path, key: string): EditResult

  /**
   * Restores the previous state. Returns false if there is nothing to undo.
   */
  undo(): boolean

  /**
   * Restores the most recently created next state. Returns false if there is nothing to redo.
   */
  redo(): boolean

  /**
   * Restores the history state with the given seq. Returns false if it is not retained.
   */
  jumpTo(seq: number): boolean

  /**
   * Releases subscribers. The session cannot be used afterwards.
   */
  dispose(): void
}

/**
 * Creates an edit session: one live tree, its cursor and its undo history.
 */
export function createEditSession(options: EditSessionOptions): EditSessionController {
  const { root, cursor: initialCursor = ROOT_PATH, undoLimit = 50 } = options

  let tree = new DocumentTree(root)
  const openedRoot = tree.root
  let cursor = nearestExistingPath(tree.root, initialCursor)
  const history = new HistoryTree(tree.snapshot(cursor), undoLimit)

  // Listeners
  const subscribers = new Set<(tree: DocumentTree, cursor: Path, cause: ChangeCause) => void>()

  const notifySubscribers = (cause: ChangeCause) => {
    for (const sub of subscribers) {
      sub(tree, cursor, cause)
    }
  }

  // Track disposal state
  let disposed = false

  const assertNotDisposed = () => {
    if (disposed) {
      usageFailure("EditSession has been disposed and cannot be used")
    }
  }

  const restore = (snapshot: Snapshot) => {
    tree = DocumentTree.fromSnapshot(snapshot)
    cursor = nearestExistingPath(tree.root, snapshot.cursor)
  }

  // The live tree is ahead of the current history node after an edit;
  // record it before moving away so redo can come back to it
  const recordLiveState = () => {
    if (history.current.root !== tree.root) {
      history.checkpoint(tree.snapshot(cursor))
    }
  }

  // Steps over history states that would not change the tree (e.g. the state a first edit
  // was checkpointed from, which equals the history root)
  const stepUntilChanged = (step: () => Snapshot | undefined): Snapshot | undefined => {
    let snapshot = step()
    while (snapshot && snapshot.root === tree.root) {
      snapshot = step()
    }
    return snapshot
  }

  const applyEdit = (
    recipe: (tree: DocumentTree) => EditResult,
    cursorAfter: (result: EditResult) => Path
  ): EditResult => {
    assertNotDisposed()
    const before = tree.snapshot(cursor)

    let result: EditResult
    try {
      result = recipe(tree)
    } catch (error) {
      tree = DocumentTree.fromSnapshot(before)
      throw error
    }

    if (!result.ok) {
      tree = DocumentTree.fromSnapshot(before)
      return result
    }
    if (tree.root === before.root) {
      return result
    }

    history.checkpoint(before)
    cursor = nearestExistingPath(tree.root, cursorAfter(result))
    notifySubscribers("edit")
    return result
  }

  return {
    getTree(): DocumentTree {
      assertNotDisposed()
      return tree
    },

    getCursor(): Path {
      assertNotDisposed()
      return cursor
    },

    setCursor(path: Path): boolean {
      assertNotDisposed()
      if (!tree.read(path)) {
        return false
      }
      cursor = freezePath(path)
      notifySubscribers("cursor")
      return true
    },

    getHistory(): HistoryTree {
      assertNotDisposed()
      return history
    },

    isModified(): boolean {
      assertNotDisposed()
      return tree.root !== openedRoot
    },

    subscribe(callback: (tree: DocumentTree, cursor: Path, cause: ChangeCause) => void) {
      assertNotDisposed()
      subscribers.add(callback)
      return () => {
        subscribers.delete(callback)
      }
    },

    edit(recipe: (tree: DocumentTree) => EditResult, nextCursor?: Path): EditResult {
      return applyEdit(recipe, () => nextCursor ?? cursor)
    },

    insert(parentPath: Path, position: number, node: Node, key?: string): EditResult {
      return applyEdit(
        (t) => t.insert(parentPath, position, node, key),
        () => childPath(parentPath, position)
      )
    },

    delete(path?: Path, deleteOptions?: DeleteOptions): EditResult {
      const target = path ?? cursor
      return applyEdit(
        (t) => t.delete(target, deleteOptions),
        () => target
      )
    },

    replace(path: Path, node: Node): EditResult {
      return applyEdit(
        (t) => t.replace(path, node),
        () => cursor
      )
    },

    setScalar(path: Path, value: ScalarValue): EditResult {
      return applyEdit(
        (t) => {
          const current = t.read(path)
          if (!current) {
            return {
              ok: false,
              error: new EditCoreError("not-found", "Nothing to edit", { path }),
            }
          }
          if (!isScalar(current.value)) {
            return {
              ok: false,
              error: new EditCoreError("invalid-node", "Only scalars can be edited in place", {
                path,
              }),
            }
          }
          // strings keep their presentation style, only the content changes
          const next =
            current.value.kind === "string" && value.kind === "string"
              ? stringValue(value.value, current.value.style)
              : value
          return t.readWrite(path)?.setValue(next) ?? OK
        },
        () => cursor
      )
    },

    renameKey(path: Path, key: string): EditResult {
      return applyEdit(
        (t) => t.renameKey(path, key),
        () => cursor
      )
    },

    undo(): boolean {
      assertNotDisposed()
      recordLiveState()
      const snapshot = stepUntilChanged(() => history.undo())
      if (!snapshot) {
        return false
      }
      restore(snapshot)
      notifySubscribers("undo")
      return true
    },

    redo(): boolean {
      assertNotDisposed()
      const snapshot = stepUntilChanged(() => history.redo())
      if (!snapshot) {
        return false
      }
      restore(snapshot)
      notifySubscribers("redo")
      return true
    },

    jumpTo(seq: number): boolean {
      assertNotDisposed()
      if (!history.getNode(seq)) {
        return false
      }
      recordLiveState()
      const snapshot = history.jumpTo(seq)
      if (!snapshot) {
        return false
      }
      restore(snapshot)
      notifySubscribers("jump")
      return true
    },

    dispose(): void {
      if (disposed) return // Already disposed, no-op
      disposed = true
      subscribers.clear()
    },
  }
}
