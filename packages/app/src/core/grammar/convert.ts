import { Match } from "effect"
import * as Either from "effect/Either"

import type { ParseError } from "../errors.js"
import { unexpectedToken } from "../errors.js"
import { numberFromLiteral } from "../number.js"
import type { Value } from "../value.js"
import { jsonArray, jsonBool, jsonNull, jsonNumber, jsonObject, jsonString } from "../value.js"
import type { Pair } from "./engine.js"
import type { JsonRule } from "./json-grammar.js"

// CHANGE: walk JSON parse trees into value trees
// WHY: the grammar engine validates structure; this step only interprets it
// REF: req-grammar-convert-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p from runGrammar(jsonGrammar): convert(p) = parseDocument(p.text) when both succeed
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the only input-dependent failure is numeric conversion
// COMPLEXITY: O(n) where n = number of nodes

type JsonPair = Pair<JsonRule>

// A tree the JSON grammar cannot produce; reported instead of thrown.
const malformed = (pair: JsonPair, expected: string): ParseError =>
  unexpectedToken(pair.start, [expected], pair.rule)

const childOf = (pair: JsonPair, rule: JsonRule): JsonPair | undefined =>
  pair.children.find((child) => child.rule === rule)

const stringText = (pair: JsonPair): Either.Either<string, ParseError> => {
  const chars = childOf(pair, "chars")
  return chars === undefined ? Either.left(malformed(pair, "chars")) : Either.right(chars.text)
}

const convertMember = (pair: JsonPair): Either.Either<readonly [string, Value], ParseError> => {
  const key = childOf(pair, "string")
  const value = childOf(pair, "value")
  if (pair.rule !== "pair" || key === undefined || value === undefined) {
    return Either.left(malformed(pair, "pair"))
  }
  const text = stringText(key)
  if (Either.isLeft(text)) {
    return Either.left(text.left)
  }
  return Either.map(convertPair(value), (converted) => [text.right, converted] as const)
}

const convertValue = (pair: JsonPair): Either.Either<Value, ParseError> => {
  const [inner] = pair.children
  return pair.children.length === 1 && inner !== undefined
    ? convertPair(inner)
    : Either.left(malformed(pair, "value"))
}

/**
 * Convert one node of a JSON parse tree into a Value.
 *
 * @param pair - A node produced by the JSON grammar.
 * @returns The value, or InvalidNumericLiteral for an out-of-range number.
 *
 * @pure true
 * @invariant object members are folded in source order, last key wins
 * @complexity O(n)
 */
export const convertPair = (pair: JsonPair): Either.Either<Value, ParseError> =>
  Match.value(pair.rule).pipe(
    Match.when("value", () => convertValue(pair)),
    Match.when("null", () => Either.right(jsonNull)),
    Match.when("bool", () => Either.right(jsonBool(pair.text === "true"))),
    Match.when("number", () => Either.map(numberFromLiteral(pair.text, pair.start), jsonNumber)),
    Match.when("string", () => Either.map(stringText(pair), jsonString)),
    Match.when("chars", () => Either.right(jsonString(pair.text))),
    Match.when("array", () => Either.map(Either.all(pair.children.map(convertPair)), jsonArray)),
    Match.when("object", () => Either.map(Either.all(pair.children.map(convertMember)), jsonObject)),
    Match.when("pair", () => Either.left(malformed(pair, "value"))),
    Match.when("json", () => Either.left(malformed(pair, "value"))),
    Match.exhaustive
  )
