import { castDraft, freeze, produce, type Draft } from "immer"
import { externallyReferencedAnchors } from "./anchors"
import { attempt, failure, type EditResult } from "./error"
import { childCount, childNodes, isContainer, type Node, type Value } from "./node"
import { freezePath, isValidPath, resolvePath, type Path } from "./path"
import { createSnapshot, type Snapshot } from "./snapshot"

export type DeleteOptions = {
  /**
   * Delete even if the subtree defines an anchor that aliases elsewhere still refer to.
   * Default: false
   */
  force?: boolean
}

/**
 * Resolves `path` inside a draft, marking every node on the way (target included) as modified.
 * Returns undefined if the path does not resolve.
 */
function resolveDraftForWrite(root: Draft<Node>, path: Path): Draft<Node> | undefined {
  let current = root
  current.modified = true
  for (const index of path) {
    const value = current.value
    let next: Draft<Node> | undefined
    switch (value.kind) {
      case "mapping":
        next = value.entries[index]?.node
        break
      case "sequence":
        next = value.items[index]
        break
      case "documents":
        next = value.documents[index]
        break
      default:
        return undefined
    }
    if (!next) return undefined
    next.modified = true
    current = next
  }
  return current
}

function requireDraft(root: Draft<Node>, path: Path): Draft<Node> {
  const node = resolveDraftForWrite(root, path)
  if (!node) {
    failure("not-found", `Nothing at path [${path.join(", ")}]`, { path })
  }
  return node
}

function containsDocuments(value: Value): boolean {
  return value.kind === "documents" || childNodes(value).some((n) => containsDocuments(n.value))
}

function assertUniqueKeys(value: Value): void {
  if (value.kind === "mapping") {
    const seen = new Set<string>()
    for (const { key } of value.entries) {
      if (seen.has(key)) {
        failure("duplicate-key", `Key "${key}" appears more than once`, { key })
      }
      seen.add(key)
    }
  }
  for (const child of childNodes(value)) {
    assertUniqueKeys(child.value)
  }
}

/**
 * Checks a subtree about to be put into a tree: a documents value may only sit at the root
 * and never inside anything, and no mapping in it may repeat a key.
 */
function assertPlaceable(node: Node, atRoot: boolean): void {
  const value = node.value
  let misplaced: boolean
  if (atRoot && value.kind === "documents") {
    misplaced = value.documents.some((doc) => containsDocuments(doc.value))
  } else {
    misplaced = containsDocuments(value)
  }
  if (misplaced) {
    failure("invalid-node", "A documents value can only be the root of a tree")
  }
  assertUniqueKeys(value)
}

function checkPosition(position: number, length: number, allowEnd: boolean): void {
  const max = allowEnd ? length : length - 1
  if (!Number.isInteger(position) || position < 0 || position > max) {
    failure("out-of-range", `Position ${position} out of range for container of length ${length}`, {
      position,
      length,
    })
  }
}

/**
 * A parsed document, addressable and editable by `Path`.
 *
 * The root is kept deeply frozen; each successful edit swaps in a new root produced with
 * immer, so unchanged subtrees are shared between versions. A `Node` obtained from `read`
 * is therefore a stable value: later edits never change it.
 *
 * All edits return an `EditResult` and either apply completely or leave the tree as it was.
 */
export class DocumentTree {
  private currentRoot: Node

  constructor(root: Node) {
    this.currentRoot = freeze(root, true)
  }

  static fromSnapshot(snapshot: Snapshot): DocumentTree {
    return new DocumentTree(snapshot.root)
  }

  get root(): Node {
    return this.currentRoot
  }

  /**
   * Node at `path`, or undefined when the path runs into a scalar or past the end of a container.
   */
  read(path: Path): Node | undefined {
    return resolvePath(this.currentRoot, path)
  }

  /**
   * Writable view of the node at `path`, or undefined if there is none.
   * Obtaining the view marks the node and all of its ancestors as modified.
   */
  readWrite(path: Path): NodeWriter | undefined {
    if (!this.read(path)) return undefined
    this.currentRoot = produce(this.currentRoot, (draft) => {
      resolveDraftForWrite(draft, path)
    })
    return new NodeWriter(this, freezePath(path))
  }

  /**
   * Key of the mapping entry `path` selects; undefined for the root and for sequence elements.
   */
  keyAt(path: Path): string | undefined {
    if (path.length === 0) return undefined
    const parent = this.read(path.slice(0, -1))
    if (!parent || parent.value.kind !== "mapping") return undefined
    return parent.value.entries[path[path.length - 1]]?.key
  }

  /**
   * Number of children of the node at `path` (0 for scalars), or undefined if there is no node.
   */
  childCount(path: Path): number | undefined {
    const node = this.read(path)
    return node ? childCount(node.value) : undefined
  }

  /**
   * Inserts `node` as child number `position` of the container at `parentPath`.
   * Mappings need a `key` that is not present yet; sequences must not be given one.
   * `position` equal to the container length appends.
   */
  insert(parentPath: Path, position: number, node: Node, key?: string): EditResult {
    return this.commit((root) => {
      const parent = requireDraft(root, parentPath)
      const value = parent.value
      if (!isContainer(value)) {
        failure("not-container", `Cannot insert into a ${value.kind}`, { path: parentPath })
      }
      checkPosition(position, childCount(value), true)
      assertPlaceable(node, false)
      const child = castDraft(freeze(node, true))

      switch (value.kind) {
        case "mapping":
          if (key === undefined) {
            failure("missing-key", "Inserting into a mapping requires a key", { path: parentPath })
          }
          if (value.entries.some((entry) => entry.key === key)) {
            failure("duplicate-key", `Key "${key}" already exists`, { path: parentPath, key })
          }
          value.entries.splice(position, 0, { key, node: child })
          break
        case "sequence":
        case "documents":
          if (key !== undefined) {
            failure("unexpected-key", `Cannot insert a keyed entry into a ${value.kind}`, {
              path: parentPath,
              key,
            })
          }
          if (value.kind === "sequence") {
            value.items.splice(position, 0, child)
          } else {
            value.documents.splice(position, 0, child)
          }
          break
      }
    })
  }

  /**
   * Removes the node at `path` from its parent; later siblings shift down by one.
   * The root cannot be deleted.
   *
   * Unless `force` is set, a subtree defining an anchor that aliases outside of it still refer
   * to is kept and `anchor-in-use` is reported, so only a forced delete succeeds for every
   * existing non-root path.
   */
  delete(path: Path, options: DeleteOptions = {}): EditResult {
    const { force = false } = options
    return attempt(() => {
      if (path.length === 0) {
        failure("cannot-delete-root", "Cannot delete root node")
      }
      if (!isValidPath(path)) {
        failure("out-of-range", `Invalid path [${path.join(", ")}]`, { path })
      }
      const parentPath = path.slice(0, -1)
      const index = path[path.length - 1]

      const parent = this.read(parentPath)
      if (!parent) {
        failure("not-found", "Parent node not found", { path })
      }
      if (!isContainer(parent.value)) {
        failure("not-container", "Parent is not a container type", { path })
      }
      checkPosition(index, childCount(parent.value), false)

      if (!force) {
        const referenced = externallyReferencedAnchors(this.currentRoot, path)
        for (const [anchor, count] of referenced) {
          failure("anchor-in-use", `Cannot delete anchor &${anchor}: ${count} alias(es) refer to it`, {
            path,
            anchor,
            count,
          })
        }
      }

      this.currentRoot = produce(this.currentRoot, (root) => {
        const value = requireDraft(root, parentPath).value
        switch (value.kind) {
          case "mapping":
            value.entries.splice(index, 1)
            break
          case "sequence":
            value.items.splice(index, 1)
            break
          case "documents":
            value.documents.splice(index, 1)
            break
        }
      })
    })
  }

  /**
   * Puts `node` in place of the node at `path` (the root included). A mapping entry keeps its key.
   */
  replace(path: Path, node: Node): EditResult {
    return this.commit((root) => {
      if (!isValidPath(path)) {
        failure("out-of-range", `Invalid path [${path.join(", ")}]`, { path })
      }
      assertPlaceable(node, path.length === 0)
      const frozen = freeze(node, true)
      if (path.length === 0) {
        return castDraft(frozen)
      }
      const parent = requireDraft(root, path.slice(0, -1)).value
      const index = path[path.length - 1]
      switch (parent.kind) {
        case "mapping": {
          checkPosition(index, parent.entries.length, false)
          const entry = parent.entries[index]
          if (!entry) failure("not-found", "Nothing to replace", { path })
          entry.node = castDraft(frozen)
          return
        }
        case "sequence":
        case "documents": {
          const list = parent.kind === "sequence" ? parent.items : parent.documents
          checkPosition(index, list.length, false)
          list[index] = castDraft(frozen)
          return
        }
        default:
          failure("not-found", "Nothing to replace", { path })
      }
    })
  }

  /**
   * Renames the mapping entry selected by `path`, keeping its position and node.
   */
  renameKey(path: Path, key: string): EditResult {
    return this.commit((root) => {
      if (path.length === 0) {
        failure("unexpected-key", "The root has no key", { path })
      }
      const parent = requireDraft(root, path.slice(0, -1)).value
      if (parent.kind !== "mapping") {
        failure("unexpected-key", `Entries of a ${parent.kind} have no key`, { path })
      }
      const index = path[path.length - 1]
      const entry = parent.entries[index]
      if (!entry) {
        failure("not-found", "No entry to rename", { path })
      }
      if (parent.entries.some((other, i) => i !== index && other.key === key)) {
        failure("duplicate-key", `Key "${key}" already exists`, { path, key })
      }
      entry.key = key
      entry.node.modified = true
    })
  }

  /**
   * Applies `recipe` to a draft of the node at `path`. The node and its ancestors become modified.
   */
  modify(path: Path, recipe: (node: Draft<Node>) => void): EditResult {
    return this.commit((root) => {
      recipe(requireDraft(root, path))
    }, path)
  }

  /**
   * Independent copy of this tree. Edits to either one never show up in the other.
   */
  duplicate(): DocumentTree {
    return new DocumentTree(this.currentRoot)
  }

  snapshot(cursor: Path): Snapshot {
    return createSnapshot(this.currentRoot, cursor)
  }

  /**
   * Produces the next root with `recipe` and installs it. When `checkAt` is given, the node
   * there is validated first, for recipes that can put arbitrary values into the tree.
   * Any failure leaves the current root untouched.
   */
  private commit(recipe: (root: Draft<Node>) => Draft<Node> | void, checkAt?: Path): EditResult {
    return attempt(() => {
      const next = produce(this.currentRoot, recipe)
      if (checkAt) {
        const changed = resolvePath(next, checkAt)
        if (changed) {
          assertPlaceable(changed, checkAt.length === 0)
        }
      }
      this.currentRoot = next
    })
  }
}

/**
 * Writable view of one node of a `DocumentTree`, bound to the path it was obtained with.
 * The path is not updated by structural edits made through the tree afterwards.
 */
export class NodeWriter {
  constructor(
    private readonly tree: DocumentTree,
    readonly path: Path
  ) {}

  get node(): Node | undefined {
    return this.tree.read(this.path)
  }

  /**
   * Replaces the value, keeping the node's anchor and source span.
   */
  setValue(value: Value): EditResult {
    return this.tree.modify(this.path, (draft) => {
      draft.value = castDraft(freeze(value, true))
    })
  }

  /**
   * Mutates the value in place through an immer draft.
   */
  update(recipe: (value: Draft<Value>) => void): EditResult {
    return this.tree.modify(this.path, (draft) => {
      recipe(draft.value)
    })
  }

  setAnchor(anchor: string | undefined): EditResult {
    return this.tree.modify(this.path, (draft) => {
      if (anchor === undefined) {
        delete draft.anchor
      } else {
        draft.anchor = anchor
      }
    })
  }
}
