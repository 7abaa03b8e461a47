import * as Either from "effect/Either"

import type { Cursor } from "./cursor.js"
import { advance, describeFound, startsWith } from "./cursor.js"
import type { ParseError } from "./errors.js"
import { quoteToken, unexpectedToken } from "./errors.js"

// CHANGE: provide the parser type and the combinators the JSON productions are built from
// WHY: primitives and containers share one success/failure protocol over an immutable cursor
// REF: req-combinator-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p, c: p(c) = Left(e) → the caller still holds c unchanged
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: parsers never throw; failure carries the offset it was detected at
// COMPLEXITY: O(1) per combinator application

export interface Parsed<A> {
  readonly value: A
  readonly rest: Cursor
}

export type ParseResult<A> = Either.Either<Parsed<A>, ParseError>

export type Parser<A> = (cursor: Cursor) => ParseResult<A>

export const ok = <A>(value: A, rest: Cursor): ParseResult<A> => Either.right({ value, rest })

export const map = <A, B>(parser: Parser<A>, f: (a: A) => B): Parser<B> => (cursor) =>
  Either.map(parser(cursor), (parsed) => ({ value: f(parsed.value), rest: parsed.rest }))

/**
 * Match an exact piece of text at the cursor.
 *
 * @pure true
 * @complexity O(n) where n = text length
 */
export const tag = (text: string): Parser<string> => (cursor) =>
  startsWith(cursor, text)
    ? ok(text, advance(cursor, text.length))
    : Either.left(unexpectedToken(cursor.offset, [quoteToken(text)], describeFound(cursor.input, cursor.offset)))

/**
 * Consume characters while the predicate holds, requiring at least `min` of them.
 *
 * @param predicate - Test applied to each character.
 * @param label - Name reported when fewer than `min` characters match.
 * @param min - Minimum number of characters.
 *
 * @pure true
 * @complexity O(n) where n = consumed characters
 */
export const takeWhile = (
  predicate: (char: string) => boolean,
  label: string,
  min: number
): Parser<string> =>
(cursor) => {
  let end = cursor.offset
  while (end < cursor.input.length && predicate(cursor.input.charAt(end))) {
    end += 1
  }
  if (end - cursor.offset < min) {
    return Either.left(unexpectedToken(end, [label], describeFound(cursor.input, end)))
  }
  return ok(cursor.input.slice(cursor.offset, end), advance(cursor, end - cursor.offset))
}

const isWhitespace = (char: string): boolean => char === " " || char === "\t" || char === "\r" || char === "\n"

/**
 * Move past spaces, tabs, carriage returns and line feeds.
 *
 * @pure true
 * @complexity O(n) where n = skipped characters
 */
export const skipSpace = (cursor: Cursor): Cursor => {
  let end = cursor.offset
  while (end < cursor.input.length && isWhitespace(cursor.input.charAt(end))) {
    end += 1
  }
  return advance(cursor, end - cursor.offset)
}

/**
 * Surround a parser with insignificant whitespace on both sides.
 *
 * @pure true
 * @invariant the whitespace never reaches the produced value
 */
export const spaced = <A>(parser: Parser<A>): Parser<A> => (cursor) =>
  Either.map(parser(skipSpace(cursor)), (parsed) => ({ value: parsed.value, rest: skipSpace(parsed.rest) }))

/**
 * Try a parser and fall back to `undefined` without consuming input.
 *
 * @pure true
 */
export const optional = <A>(parser: Parser<A>): Parser<A | undefined> => (cursor) => {
  const result = parser(cursor)
  return Either.isRight(result) ? result : ok(undefined, cursor)
}

/**
 * Run `first`, discard its value, then run `second`.
 *
 * @pure true
 */
export const preceded = <A>(first: Parser<unknown>, second: Parser<A>): Parser<A> => (cursor) => {
  const head = first(cursor)
  if (Either.isLeft(head)) {
    return Either.left(head.left)
  }
  return second(head.right.rest)
}

const mergeExpected = (failures: ReadonlyArray<ParseError>): ReadonlyArray<string> => {
  const expected: Array<string> = []
  for (const failure of failures) {
    if (failure._tag === "UnexpectedToken") {
      for (const label of failure.expected) {
        if (!expected.includes(label)) {
          expected.push(label)
        }
      }
    }
  }
  return expected
}

/**
 * Pick the failure that tells the most about why alternatives at `offset` failed.
 *
 * A failure other than an UnexpectedToken at `offset` means that alternative
 * recognized its leading token, so it wins. Otherwise the expected tokens of
 * all alternatives are merged into one UnexpectedToken.
 *
 * @pure true
 * @complexity O(n) where n = number of failures
 */
export const mostSpecific = (
  input: string,
  offset: number,
  failures: ReadonlyArray<ParseError>
): ParseError => {
  const committed = failures.find((failure) => failure._tag !== "UnexpectedToken" || failure.offset !== offset)
  if (committed !== undefined) {
    return committed
  }
  return unexpectedToken(offset, mergeExpected(failures), describeFound(input, offset))
}

/**
 * Ordered choice: the first alternative that succeeds wins, each one starting
 * from the same cursor.
 *
 * @pure true
 * @complexity O(k) alternative attempts
 */
export const alt = <A>(alternatives: ReadonlyArray<Parser<A>>): Parser<A> => (cursor) => {
  const failures: Array<ParseError> = []
  for (const alternative of alternatives) {
    const result = alternative(cursor)
    if (Either.isRight(result)) {
      return result
    }
    failures.push(result.left)
  }
  return Either.left(mostSpecific(cursor.input, cursor.offset, failures))
}
