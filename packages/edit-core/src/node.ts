import { usageFailure } from "./error"

/**
 * A byte range in the original source text.
 */
export type TextSpan = {
  readonly start: number // inclusive
  readonly end: number // exclusive
}

/**
 * Presentation style of a string scalar. Kept apart from the content so it survives edits.
 */
export type StringStyle = "plain" | "literal" | "folded"

/**
 * Whether a number was written as an integer or as a floating point value.
 */
export type NumberFormat = "integer" | "float"

export type NullValue = { readonly kind: "null" }

export type BooleanValue = { readonly kind: "boolean"; readonly value: boolean }

export type NumberValue = {
  readonly kind: "number"
  readonly value: number
  readonly format: NumberFormat
}

export type StringValue = {
  readonly kind: "string"
  readonly value: string
  readonly style: StringStyle
}

/**
 * A reference to the node carrying `anchor === target`.
 * Aliases are leaves: the target is found by name, never through a tree edge.
 */
export type AliasValue = { readonly kind: "alias"; readonly target: string }

export type MappingEntry = { readonly key: string; readonly node: Node }

/**
 * Ordered mapping. Entry order is insertion order and is addressed by position.
 */
export type MappingValue = { readonly kind: "mapping"; readonly entries: readonly MappingEntry[] }

export type SequenceValue = { readonly kind: "sequence"; readonly items: readonly Node[] }

/**
 * Root of a multi-document stream. Only valid as the root value of a tree.
 */
export type DocumentsValue = { readonly kind: "documents"; readonly documents: readonly Node[] }

export type ScalarValue = NullValue | BooleanValue | NumberValue | StringValue | AliasValue

export type ContainerValue = MappingValue | SequenceValue | DocumentsValue

export type Value = ScalarValue | ContainerValue

/**
 * A value plus the bookkeeping the serializer needs.
 */
export type Node = {
  readonly value: Value
  /** True once the node differs from what was loaded (new nodes start out modified). */
  readonly modified: boolean
  /** Where the node came from in the source text, when known. */
  readonly span?: TextSpan
  /** Anchor name defined on this node, if any. */
  readonly anchor?: string
}

export type NodeOptions = {
  modified?: boolean
  span?: TextSpan
  anchor?: string
}

/**
 * Wraps a value into a node. Nodes are modified by default since they did not come from a loader.
 */
export function createNode(value: Value, options: NodeOptions = {}): Node {
  const { modified = true, span, anchor } = options
  const node: { value: Value; modified: boolean; span?: TextSpan; anchor?: string } = {
    value,
    modified,
  }
  if (span) node.span = span
  if (anchor !== undefined) node.anchor = anchor
  return node
}

// --- Value constructors ---

export function nullValue(): NullValue {
  return { kind: "null" }
}

export function booleanValue(value: boolean): BooleanValue {
  return { kind: "boolean", value }
}

/**
 * Integers are held in a `number`, so magnitudes above `Number.MAX_SAFE_INTEGER` lose precision.
 * Throws for fractions and non-finite values.
 */
export function integerValue(value: number): NumberValue {
  if (!Number.isInteger(value)) {
    usageFailure(`${value} is not an integer`)
  }
  return { kind: "number", value, format: "integer" }
}

export function floatValue(value: number): NumberValue {
  return { kind: "number", value, format: "float" }
}

export function stringValue(value: string, style: StringStyle = "plain"): StringValue {
  return { kind: "string", value, style }
}

export function aliasValue(target: string): AliasValue {
  return { kind: "alias", target }
}

export function mappingValue(entries: readonly MappingEntry[] = []): MappingValue {
  return { kind: "mapping", entries }
}

export function sequenceValue(items: readonly Node[] = []): SequenceValue {
  return { kind: "sequence", items }
}

export function documentsValue(documents: readonly Node[] = []): DocumentsValue {
  return { kind: "documents", documents }
}

// --- Classification ---

export function isMapping(value: Value): value is MappingValue {
  return value.kind === "mapping"
}

/**
 * Sequences proper. The documents root behaves like a sequence for navigation
 * but is reported separately by `isDocuments`.
 */
export function isSequence(value: Value): value is SequenceValue {
  return value.kind === "sequence"
}

export function isDocuments(value: Value): value is DocumentsValue {
  return value.kind === "documents"
}

export function isContainer(value: Value): value is ContainerValue {
  return value.kind === "mapping" || value.kind === "sequence" || value.kind === "documents"
}

export function isScalar(value: Value): value is ScalarValue {
  return !isContainer(value)
}

export function isAlias(value: Value): value is AliasValue {
  return value.kind === "alias"
}

/**
 * Children of a container in position order; empty for scalars.
 */
export function childNodes(value: Value): readonly Node[] {
  switch (value.kind) {
    case "mapping":
      return value.entries.map((entry) => entry.node)
    case "sequence":
      return value.items
    case "documents":
      return value.documents
    default:
      return []
  }
}

export function childCount(value: Value): number {
  switch (value.kind) {
    case "mapping":
      return value.entries.length
    case "sequence":
      return value.items.length
    case "documents":
      return value.documents.length
    default:
      return 0
  }
}

/**
 * Child at `index`, or undefined when out of range or when `value` is a scalar.
 */
export function childAt(value: Value, index: number): Node | undefined {
  if (!Number.isInteger(index) || index < 0) return undefined
  switch (value.kind) {
    case "mapping":
      return value.entries[index]?.node
    case "sequence":
      return value.items[index]
    case "documents":
      return value.documents[index]
    default:
      return undefined
  }
}
