import equal from "fast-deep-equal"
import type { Node, Value } from "./node"

/**
 * Shape of a node with the bookkeeping fields (`modified`, `span`) dropped.
 * Anchors are kept, they are part of the document.
 */
type BareNode = { value: BareValue; anchor?: string }

type BareValue =
  | Exclude<Value, { kind: "mapping" | "sequence" | "documents" }>
  | { kind: "mapping"; entries: { key: string; node: BareNode }[] }
  | { kind: "sequence"; items: BareNode[] }
  | { kind: "documents"; documents: BareNode[] }

function stripNode(node: Node): BareNode {
  const bare: BareNode = { value: stripValue(node.value) }
  if (node.anchor !== undefined) bare.anchor = node.anchor
  return bare
}

function stripValue(value: Value): BareValue {
  switch (value.kind) {
    case "mapping":
      return {
        kind: "mapping",
        entries: value.entries.map((entry) => ({ key: entry.key, node: stripNode(entry.node) })),
      }
    case "sequence":
      return { kind: "sequence", items: value.items.map(stripNode) }
    case "documents":
      return { kind: "documents", documents: value.documents.map(stripNode) }
    default:
      return value
  }
}

/**
 * Deep equality of two values, ignoring the modified flag and source spans of every node inside.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  return equal(stripValue(a), stripValue(b))
}

/**
 * Deep equality of two nodes, ignoring the modified flag and source spans.
 */
export function nodesEqual(a: Node, b: Node): boolean {
  if (a === b) return true
  return equal(stripNode(a), stripNode(b))
}
