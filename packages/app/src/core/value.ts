// CHANGE: introduce the value tree produced by both parsing engines
// WHY: one closed model shared by the combinator and grammar paths
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ {Null,Bool,Number,String,Array,Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Int vs Float is decided by the literal shape, never by magnitude
// COMPLEXITY: O(1) construction, O(n) equality

export type JsonNumber =
  | { readonly _tag: "Int"; readonly value: bigint }
  | { readonly _tag: "Float"; readonly value: number }

export type Value =
  | { readonly _tag: "Null" }
  | { readonly _tag: "Bool"; readonly value: boolean }
  | { readonly _tag: "Number"; readonly value: JsonNumber }
  | { readonly _tag: "String"; readonly value: string }
  | { readonly _tag: "Array"; readonly items: ReadonlyArray<Value> }
  | { readonly _tag: "Object"; readonly entries: ReadonlyMap<string, Value> }

export const jsonNull: Value = { _tag: "Null" }

export const jsonBool = (value: boolean): Value => ({ _tag: "Bool", value })

export const intNumber = (value: bigint): JsonNumber => ({ _tag: "Int", value })

export const floatNumber = (value: number): JsonNumber => ({ _tag: "Float", value })

export const jsonNumber = (value: JsonNumber): Value => ({ _tag: "Number", value })

export const jsonInt = (value: bigint): Value => jsonNumber(intNumber(value))

export const jsonFloat = (value: number): Value => jsonNumber(floatNumber(value))

export const jsonString = (value: string): Value => ({ _tag: "String", value })

export const jsonArray = (items: ReadonlyArray<Value>): Value => ({ _tag: "Array", items })

/**
 * Build an object value from key/value pairs in source order.
 *
 * A key seen twice keeps the value of its last occurrence.
 *
 * @pure true
 * @complexity O(n)
 */
export const jsonObject = (
  pairs: ReadonlyArray<readonly [string, Value]>
): Value => {
  const entries = new Map<string, Value>()
  for (const [key, value] of pairs) {
    entries.set(key, value)
  }
  return { _tag: "Object", entries }
}

const numberEquals = (left: JsonNumber, right: JsonNumber): boolean => {
  if (left._tag === "Int" && right._tag === "Int") {
    return left.value === right.value
  }
  if (left._tag === "Float" && right._tag === "Float") {
    return Object.is(left.value, right.value)
  }
  return false
}

const itemsEqual = (left: ReadonlyArray<Value>, right: ReadonlyArray<Value>): boolean => {
  if (left.length !== right.length) {
    return false
  }
  return left.every((item, index) => {
    const other = right[index]
    return other !== undefined && valueEquals(item, other)
  })
}

const entriesEqual = (
  left: ReadonlyMap<string, Value>,
  right: ReadonlyMap<string, Value>
): boolean => {
  if (left.size !== right.size) {
    return false
  }
  for (const [key, value] of left) {
    const other = right.get(key)
    if (other === undefined || !valueEquals(value, other)) {
      return false
    }
  }
  return true
}

/**
 * Structural equality of two value trees.
 *
 * @pure true
 * @invariant object key order is ignored; Int(1) ≠ Float(1)
 * @complexity O(n) where n = number of nodes
 */
export const valueEquals = (left: Value, right: Value): boolean => {
  switch (left._tag) {
    case "Null":
      return right._tag === "Null"
    case "Bool":
      return right._tag === "Bool" && right.value === left.value
    case "String":
      return right._tag === "String" && right.value === left.value
    case "Number":
      return right._tag === "Number" && numberEquals(left.value, right.value)
    case "Array":
      return right._tag === "Array" && itemsEqual(left.items, right.items)
    case "Object":
      return right._tag === "Object" && entriesEqual(left.entries, right.entries)
  }
}
