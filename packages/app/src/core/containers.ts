import * as Either from "effect/Either"

import type { Parser } from "./combinator.js"
import { ok, skipSpace, spaced, tag } from "./combinator.js"
import type { Cursor } from "./cursor.js"
import { describeFound, isAtEnd } from "./cursor.js"
import type { LiteralKind, ParseError } from "./errors.js"
import { quoteToken, unexpectedToken, unterminatedLiteral } from "./errors.js"
import { parseString } from "./primitives.js"
import type { Value } from "./value.js"

// CHANGE: parse bracketed arrays and braced objects over an element parser
// WHY: containers recurse into the value dispatcher for every element
// REF: req-containers-1
// SOURCE: n/a
// FORMAT THEOREM: ∀xs: array("[" xs.join(",") "]") = Right(xs)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: once the opening delimiter is consumed a container never backtracks
// COMPLEXITY: O(n) in the container's source length, plus element costs

export type ObjectPair = readonly [string, Value]

const openBracket = spaced(tag("["))
const closeBracket = spaced(tag("]"))
const openBrace = spaced(tag("{"))
const closeBrace = spaced(tag("}"))
const comma = spaced(tag(","))
const colon = spaced(tag(":"))

// Failure for a token missing at `cursor`: running out of input means the
// container opened at `start` was never closed.
const missing = (
  start: number,
  literal: LiteralKind,
  cursor: Cursor,
  expected: ReadonlyArray<string>
): ParseError => {
  const next = skipSpace(cursor)
  return isAtEnd(next)
    ? unterminatedLiteral(start, literal)
    : unexpectedToken(next.offset, expected, describeFound(next.input, next.offset))
}

/**
 * Build the array production: `[` (value (`,` value)*)? `]`.
 *
 * @param element - Parser for each element, usually the value dispatcher.
 * @returns Parser of the elements in source order.
 *
 * @pure true
 * @invariant whitespace around delimiters and separators is skipped
 * @complexity O(n)
 */
export const arrayOf = (element: Parser<Value>): Parser<ReadonlyArray<Value>> => (cursor) => {
  const start = skipSpace(cursor).offset
  const open = openBracket(cursor)
  if (Either.isLeft(open)) {
    return Either.left(open.left)
  }
  const items: Array<Value> = []
  let rest = open.right.rest
  const empty = closeBracket(rest)
  if (Either.isRight(empty)) {
    return ok(items, empty.right.rest)
  }
  let more = true
  while (more) {
    if (isAtEnd(rest)) {
      return Either.left(unterminatedLiteral(start, "array"))
    }
    const item = element(rest)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right.value)
    rest = item.right.rest
    const separator = comma(rest)
    more = Either.isRight(separator)
    if (Either.isRight(separator)) {
      rest = separator.right.rest
    }
  }
  const close = closeBracket(rest)
  if (Either.isLeft(close)) {
    return Either.left(missing(start, "array", rest, [quoteToken(","), quoteToken("]")]))
  }
  return ok(items, close.right.rest)
}

/**
 * Build the object production: `{` pair (`,` pair)* `}` with pair = string `:` value.
 *
 * At least one pair is required, so `{}` is rejected.
 *
 * @param element - Parser for each member value, usually the value dispatcher.
 * @returns Parser of the key/value pairs in source order, duplicates included.
 *
 * @pure true
 * @complexity O(n)
 */
export const objectOf = (element: Parser<Value>): Parser<ReadonlyArray<ObjectPair>> => (cursor) => {
  const start = skipSpace(cursor).offset
  const open = openBrace(cursor)
  if (Either.isLeft(open)) {
    return Either.left(open.left)
  }
  const pairs: Array<ObjectPair> = []
  let rest = open.right.rest
  let more = true
  while (more) {
    if (isAtEnd(rest)) {
      return Either.left(unterminatedLiteral(start, "object"))
    }
    const key = parseString(rest)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const separator = colon(key.right.rest)
    if (Either.isLeft(separator)) {
      return Either.left(missing(start, "object", key.right.rest, [quoteToken(":")]))
    }
    rest = separator.right.rest
    if (isAtEnd(rest)) {
      return Either.left(unterminatedLiteral(start, "object"))
    }
    const value = element(rest)
    if (Either.isLeft(value)) {
      return Either.left(value.left)
    }
    pairs.push([key.right.value, value.right.value])
    rest = value.right.rest
    const next = comma(rest)
    more = Either.isRight(next)
    if (Either.isRight(next)) {
      rest = next.right.rest
    }
  }
  const close = closeBrace(rest)
  if (Either.isLeft(close)) {
    return Either.left(missing(start, "object", rest, [quoteToken(","), quoteToken("}")]))
  }
  return ok(pairs, close.right.rest)
}
