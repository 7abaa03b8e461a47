import * as Either from "effect/Either"

import type { Parser } from "./combinator.js"
import { alt, map, ok, optional, preceded, tag, takeWhile } from "./combinator.js"
import { advance } from "./cursor.js"
import { quoteToken, unexpectedToken, unterminatedLiteral } from "./errors.js"
import { numberFromParts } from "./number.js"
import type { JsonNumber } from "./value.js"

// CHANGE: recognize the leaf literals null, true/false, numbers and strings
// WHY: leaves are the base cases of the recursive value grammar
// REF: req-primitives-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p ∈ {null,bool,number,string}: p(c) = Right(r) → r.rest.offset > c.offset
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no primitive consumes input on failure
// COMPLEXITY: O(n) where n = literal length

export const parseNull: Parser<null> = map(tag("null"), () => null)

export const parseBool: Parser<boolean> = alt([
  map(tag("true"), () => true),
  map(tag("false"), () => false)
])

const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const digits = takeWhile(isDigit, "digit", 1)

const fraction = optional(preceded(tag("."), digits))

/**
 * Parse `-? digit+ ("." digit+)?`.
 *
 * A `.` without digits after it, and any exponent, stay unconsumed.
 *
 * @pure true
 * @invariant Float iff a fraction was written
 * @complexity O(n)
 */
export const parseNumber: Parser<JsonNumber> = (cursor) => {
  const negative = optional(tag("-"))(cursor)
  if (Either.isLeft(negative)) {
    return Either.left(negative.left)
  }
  const integer = digits(negative.right.rest)
  if (Either.isLeft(integer)) {
    const failure = integer.left
    return Either.left(
      failure._tag === "UnexpectedToken" && failure.offset === cursor.offset
        ? unexpectedToken(cursor.offset, [quoteToken("-"), "digit"], failure.found)
        : failure
    )
  }
  const decimals = fraction(integer.right.rest)
  if (Either.isLeft(decimals)) {
    return Either.left(decimals.left)
  }
  const converted = numberFromParts({
    negative: negative.right.value !== undefined,
    integer: integer.right.value,
    fraction: decimals.right.value
  }, cursor.offset)
  if (Either.isLeft(converted)) {
    return Either.left(converted.left)
  }
  return ok(converted.right, decimals.right.rest)
}

/**
 * Parse a double-quoted string without escape processing.
 *
 * The first `"` after the opening quote closes the string, so `\"` cannot
 * appear inside a value.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseString: Parser<string> = (cursor) => {
  const open = tag("\"")(cursor)
  if (Either.isLeft(open)) {
    return Either.left(open.left)
  }
  const start = open.right.rest.offset
  const close = cursor.input.indexOf("\"", start)
  if (close === -1) {
    return Either.left(unterminatedLiteral(cursor.offset, "string"))
  }
  return ok(cursor.input.slice(start, close), advance(cursor, close + 1 - cursor.offset))
}
