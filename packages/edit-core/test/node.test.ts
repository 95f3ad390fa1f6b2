import { describe, expect, it } from "vitest"
import { UsageError } from "../src/error"
import {
  aliasValue,
  booleanValue,
  childAt,
  childCount,
  childNodes,
  createNode,
  documentsValue,
  integerValue,
  isAlias,
  isContainer,
  isDocuments,
  isMapping,
  isScalar,
  isSequence,
  mappingValue,
  nullValue,
  sequenceValue,
  stringValue,
} from "../src/node"

describe("createNode", () => {
  it("creates modified nodes by default", () => {
    expect(createNode(nullValue())).toStrictEqual({ value: { kind: "null" }, modified: true })
  })

  it("only sets the optional fields it is given", () => {
    const node = createNode(booleanValue(true), {
      modified: false,
      span: { start: 4, end: 8 },
      anchor: "flag",
    })

    expect(node).toStrictEqual({
      value: { kind: "boolean", value: true },
      modified: false,
      span: { start: 4, end: 8 },
      anchor: "flag",
    })
    expect("anchor" in createNode(nullValue())).toBe(false)
  })
})

describe("value constructors", () => {
  it("default strings to the plain style", () => {
    expect(stringValue("a")).toStrictEqual({ kind: "string", value: "a", style: "plain" })
    expect(stringValue("a\nb", "literal").style).toBe("literal")
  })
})

describe("integerValue", () => {
  it("rejects numbers that are not integers", () => {
    expect(() => integerValue(1.5)).toThrow(UsageError)
    expect(() => integerValue(Number.NaN)).toThrow(UsageError)
    expect(() => integerValue(Number.POSITIVE_INFINITY)).toThrow(UsageError)
    expect(integerValue(-4)).toStrictEqual({ kind: "number", value: -4, format: "integer" })
  })
})

describe("classification", () => {
  const mapping = mappingValue()
  const sequence = sequenceValue()
  const documents = documentsValue()
  const alias = aliasValue("x")

  it("tells containers from scalars", () => {
    expect([mapping, sequence, documents].every(isContainer)).toBe(true)
    expect([nullValue(), integerValue(1), alias].some(isContainer)).toBe(false)
    expect(isScalar(alias)).toBe(true)
  })

  it("tells container kinds apart", () => {
    expect(isMapping(mapping)).toBe(true)
    expect(isSequence(sequence)).toBe(true)
    expect(isSequence(documents)).toBe(false)
    expect(isDocuments(documents)).toBe(true)
    expect(isAlias(alias)).toBe(true)
  })
})

describe("children", () => {
  const a = createNode(integerValue(1))
  const b = createNode(integerValue(2))

  it("lists mapping entry nodes in order", () => {
    const value = mappingValue([
      { key: "x", node: a },
      { key: "y", node: b },
    ])

    expect(childNodes(value)).toStrictEqual([a, b])
    expect(childCount(value)).toBe(2)
    expect(childAt(value, 1)).toBe(b)
  })

  it("has none for scalars and out of range positions", () => {
    expect(childNodes(stringValue("s"))).toStrictEqual([])
    expect(childCount(nullValue())).toBe(0)
    expect(childAt(sequenceValue([a]), 1)).toBeUndefined()
    expect(childAt(sequenceValue([a]), -1)).toBeUndefined()
    expect(childAt(integerValue(3), 0)).toBeUndefined()
  })
})
