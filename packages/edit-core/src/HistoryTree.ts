import { usageFailure } from "./error"
import type { Snapshot } from "./snapshot"

/**
 * One recorded state in the history.
 */
export type HistoryNode = {
  /** Creation order, strictly increasing across all branches. Also the node id. */
  readonly seq: number
  readonly snapshot: Snapshot
  /** Seq of the parent, null for the history root. */
  parent: number | null
  /** Seqs of the children, in creation order. */
  readonly children: number[]
  /** Wall clock at creation, for display only. Ordering always uses `seq`. */
  readonly timestamp: number
}

/**
 * Read-only view of a history node handed out to callers.
 */
export type HistoryNodeInfo = Readonly<{
  seq: number
  snapshot: Snapshot
  parent: number | null
  children: readonly number[]
  timestamp: number
}>

/**
 * Branching undo history.
 *
 * The root is the state the document was opened in. Every checkpoint becomes a child of the
 * current node, so undoing and then checkpointing starts a new branch instead of discarding
 * the old one. Redo always follows the most recently created child.
 *
 * At most `capacity` nodes are retained. When a checkpoint would exceed it, nodes that are
 * not on the root-to-current path are dropped oldest first (always a leaf, so the rest stays
 * a proper tree). If the root-to-current path alone is still too long, the history is re-rooted
 * at the oldest ancestor of current that keeps the path within capacity.
 */
export class HistoryTree {
  private readonly nodes = new Map<number, HistoryNode>()
  private rootSeqValue = 0
  private currentSeqValue = 0
  private nextSeq = 1

  readonly capacity: number

  constructor(initial: Snapshot, capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      usageFailure(`History capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
    this.nodes.set(0, {
      seq: 0,
      snapshot: initial,
      parent: null,
      children: [],
      timestamp: Date.now(),
    })
  }

  /** Number of retained nodes. */
  get size(): number {
    return this.nodes.size
  }

  get currentSeq(): number {
    return this.currentSeqValue
  }

  get rootSeq(): number {
    return this.rootSeqValue
  }

  get current(): Snapshot {
    return this.getExisting(this.currentSeqValue).snapshot
  }

  getNode(seq: number): HistoryNodeInfo | undefined {
    return this.nodes.get(seq)
  }

  canUndo(): boolean {
    return this.getExisting(this.currentSeqValue).parent !== null
  }

  canRedo(): boolean {
    return this.getExisting(this.currentSeqValue).children.length > 0
  }

  /**
   * Records `snapshot` as a new child of the current node and makes it current.
   */
  checkpoint(snapshot: Snapshot): void {
    const seq = this.nextSeq++
    const parent = this.getExisting(this.currentSeqValue)

    this.nodes.set(seq, {
      seq,
      snapshot,
      parent: parent.seq,
      children: [],
      timestamp: Date.now(),
    })
    parent.children.push(seq)
    this.currentSeqValue = seq

    this.enforceCapacity()
  }

  /**
   * Moves to the parent and returns its snapshot; undefined (and no move) at the root.
   */
  undo(): Snapshot | undefined {
    const current = this.getExisting(this.currentSeqValue)
    if (current.parent === null) {
      return undefined
    }
    this.currentSeqValue = current.parent
    return this.getExisting(current.parent).snapshot
  }

  /**
   * Moves to the newest child and returns its snapshot; undefined (and no move) without children.
   */
  redo(): Snapshot | undefined {
    const current = this.getExisting(this.currentSeqValue)
    if (current.children.length === 0) {
      return undefined
    }
    const newest = Math.max(...current.children)
    this.currentSeqValue = newest
    return this.getExisting(newest).snapshot
  }

  /**
   * Makes any retained node current, e.g. to reach a branch redo would not pick.
   * Returns undefined if `seq` is not retained.
   */
  jumpTo(seq: number): Snapshot | undefined {
    const node = this.nodes.get(seq)
    if (!node) {
      return undefined
    }
    this.currentSeqValue = seq
    return node.snapshot
  }

  /**
   * Seqs from the root to the current node, both included.
   */
  pathToCurrent(): number[] {
    const path: number[] = []
    let seq: number | null = this.currentSeqValue
    while (seq !== null) {
      path.push(seq)
      seq = this.getExisting(seq).parent
    }
    return path.reverse()
  }

  private getExisting(seq: number): HistoryNode {
    const node = this.nodes.get(seq)
    if (!node) {
      usageFailure(`History node ${seq} does not exist`)
    }
    return node
  }

  private enforceCapacity(): void {
    if (this.nodes.size <= this.capacity) {
      return
    }

    // 1. Drop the oldest leaves that are off the root-to-current path
    const protectedSeqs = new Set(this.pathToCurrent())
    while (this.nodes.size > this.capacity) {
      let oldestLeaf: HistoryNode | undefined
      for (const node of this.nodes.values()) {
        if (
          node.children.length === 0 &&
          !protectedSeqs.has(node.seq) &&
          (!oldestLeaf || node.seq < oldestLeaf.seq)
        ) {
          oldestLeaf = node
        }
      }
      if (!oldestLeaf) {
        break
      }
      this.removeLeaf(oldestLeaf)
    }

    // 2. Only the path is left and it is still too long: re-root
    if (this.nodes.size > this.capacity) {
      const path = this.pathToCurrent()
      const newRootSeq = path[path.length - this.capacity]
      for (const seq of path.slice(0, path.length - this.capacity)) {
        this.nodes.delete(seq)
      }
      this.getExisting(newRootSeq).parent = null
      this.rootSeqValue = newRootSeq
    }
  }

  private removeLeaf(leaf: HistoryNode): void {
    if (leaf.parent !== null) {
      const parent = this.getExisting(leaf.parent)
      const i = parent.children.indexOf(leaf.seq)
      if (i >= 0) {
        parent.children.splice(i, 1)
      }
    }
    this.nodes.delete(leaf.seq)
  }
}
