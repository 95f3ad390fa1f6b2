import { usageFailure } from "./error"
import {
  booleanValue,
  createNode,
  floatValue,
  integerValue,
  mappingValue,
  nullValue,
  sequenceValue,
  stringValue,
  type Node,
} from "./node"

/**
 * A JSON primitive.
 */
export type JSONPrimitive = null | boolean | number | string

/**
 * A JSON record.
 */
export type JSONRecord = { [k: string]: JSONValue }

/**
 * A JSON object.
 */
export type JSONObject = JSONRecord | JSONValue[]

/**
 * A JSON value.
 */
export type JSONValue = JSONPrimitive | JSONObject

export type FromJSONOptions = {
  /**
   * Flag given to every created node.
   * Default: false (the data is treated as freshly loaded).
   */
  modified?: boolean
}

/**
 * Builds a node tree out of plain JSON data.
 * Integral numbers become integers, everything else floats; strings are plain.
 * Object entries keep the order `Object.keys` reports.
 */
export function fromJSONValue(value: JSONValue, options: FromJSONOptions = {}): Node {
  const { modified = false } = options
  const build = (v: JSONValue): Node => {
    if (v === null) return createNode(nullValue(), { modified })
    if (typeof v === "boolean") return createNode(booleanValue(v), { modified })
    if (typeof v === "number") {
      return createNode(Number.isInteger(v) ? integerValue(v) : floatValue(v), { modified })
    }
    if (typeof v === "string") return createNode(stringValue(v), { modified })
    if (Array.isArray(v)) return createNode(sequenceValue(v.map(build)), { modified })
    return createNode(
      mappingValue(Object.keys(v).map((key) => ({ key, node: build(v[key]) }))),
      { modified }
    )
  }
  return build(value)
}

/**
 * Looks up the node an alias points at.
 */
export type AliasResolver = (target: string) => Node | undefined

/**
 * Converts a node tree back into plain JSON data.
 * A documents root becomes an array. Aliases are expanded through `resolveAlias`;
 * an alias that cannot be resolved, or that refers to one of its own ancestors, throws.
 */
export function toJSONValue(node: Node, resolveAlias?: AliasResolver): JSONValue {
  const expanding = new Set<string>()

  const convert = (n: Node): JSONValue => {
    const value = n.value
    switch (value.kind) {
      case "null":
        return null
      case "boolean":
      case "number":
      case "string":
        return value.value
      case "mapping": {
        const record: JSONRecord = {}
        for (const entry of value.entries) {
          record[entry.key] = convert(entry.node)
        }
        return record
      }
      case "sequence":
        return value.items.map(convert)
      case "documents":
        return value.documents.map(convert)
      case "alias": {
        const target = resolveAlias?.(value.target)
        if (!target) {
          usageFailure(`Unresolved alias *${value.target}`)
        }
        if (expanding.has(value.target)) {
          usageFailure(`Recursive alias *${value.target}`)
        }
        expanding.add(value.target)
        try {
          return convert(target)
        } finally {
          expanding.delete(value.target)
        }
      }
    }
  }

  return convert(node)
}
