import * as Either from "effect/Either"

import type { ParseError } from "./errors.js"
import { invalidNumericLiteral } from "./errors.js"
import type { JsonNumber } from "./value.js"
import { floatNumber, intNumber } from "./value.js"

// CHANGE: convert recognized numeric literals into Int or Float
// WHY: both engines must agree on numbers, so conversion lives in one place
// REF: req-number-1
// SOURCE: n/a
// FORMAT THEOREM: ∀l: fraction(l) = ∅ ↔ convert(l) ∈ Int
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Int values lie in [-2^63, 2^63 - 1]
// COMPLEXITY: O(n) where n = literal length

export interface NumericParts {
  readonly negative: boolean
  readonly integer: string
  readonly fraction: string | undefined
}

const INT_MIN = -(2n ** 63n)
const INT_MAX = 2n ** 63n - 1n

const literalText = (parts: NumericParts): string =>
  `${parts.negative ? "-" : ""}${parts.integer}${parts.fraction === undefined ? "" : `.${parts.fraction}`}`

/**
 * Convert the pieces of a numeric literal into a JsonNumber.
 *
 * @param parts - Sign, integer digits and optional fraction digits.
 * @param offset - Position of the literal, used for failures.
 * @returns Int when no fraction was written, Float otherwise.
 *
 * @pure true
 * @invariant the sign is applied after conversion of the magnitude
 * @complexity O(n)
 */
export const numberFromParts = (
  parts: NumericParts,
  offset: number
): Either.Either<JsonNumber, ParseError> => {
  if (parts.fraction === undefined) {
    const magnitude = BigInt(parts.integer)
    const value = parts.negative ? -magnitude : magnitude
    if (value < INT_MIN || value > INT_MAX) {
      return Either.left(invalidNumericLiteral(offset, literalText(parts), "Int"))
    }
    return Either.right(intNumber(value))
  }
  const magnitude = Number(`${parts.integer}.${parts.fraction}`)
  if (!Number.isFinite(magnitude)) {
    return Either.left(invalidNumericLiteral(offset, literalText(parts), "Float"))
  }
  return Either.right(floatNumber(parts.negative ? -magnitude : magnitude))
}

const LITERAL = /^(-?)(\d+)(?:\.(\d+))?$/u

/**
 * Split an already recognized literal such as "-12.5" and convert it.
 *
 * @pure true
 * @complexity O(n)
 */
export const numberFromLiteral = (
  literal: string,
  offset: number
): Either.Either<JsonNumber, ParseError> => {
  const match = LITERAL.exec(literal)
  const integer = match?.[2]
  if (match === null || integer === undefined) {
    return Either.left(invalidNumericLiteral(offset, literal, literal.includes(".") ? "Float" : "Int"))
  }
  return numberFromParts({ negative: match[1] === "-", integer, fraction: match[3] }, offset)
}
