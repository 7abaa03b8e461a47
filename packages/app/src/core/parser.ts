import * as Either from "effect/Either"

import type { Parser } from "./combinator.js"
import { map, mostSpecific, ok, skipSpace } from "./combinator.js"
import { arrayOf, objectOf } from "./containers.js"
import { cursorAt, describeFound, isAtEnd } from "./cursor.js"
import type { ParseError } from "./errors.js"
import { exhaustedAlternatives, unexpectedToken } from "./errors.js"
import { parseBool, parseNull, parseNumber, parseString } from "./primitives.js"
import type { DocumentParser } from "./types.js"
import type { Value } from "./value.js"
import { jsonArray, jsonBool, jsonNull, jsonNumber, jsonObject, jsonString } from "./value.js"

// CHANGE: dispatch between value productions and expose the combinator engine
// WHY: the dispatcher is the recursive entry point containers call back into
// REF: req-dispatcher-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: parseValue(c) = first success of [null,bool,number,string,array,object] at c
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every production starts from the dispatcher's own cursor
// COMPLEXITY: O(n) for an accepted document of length n

interface Production {
  readonly name: string
  readonly parser: Parser<Value>
}

const productions: ReadonlyArray<Production> = [
  { name: "null", parser: map(parseNull, () => jsonNull) },
  { name: "bool", parser: map(parseBool, jsonBool) },
  { name: "number", parser: map(parseNumber, jsonNumber) },
  { name: "string", parser: map(parseString, jsonString) },
  { name: "array", parser: (cursor) => map(arrayOf(parseValue), jsonArray)(cursor) },
  { name: "object", parser: (cursor) => map(objectOf(parseValue), jsonObject)(cursor) }
]

export const productionNames: ReadonlyArray<string> = productions.map((production) => production.name)

/**
 * Parse one value at the cursor, trying each production in a fixed order.
 *
 * @returns The first successful production, or ExhaustedAlternatives with the
 * most specific underlying failure as its cause.
 *
 * @pure true
 * @invariant failed attempts leave no trace on the cursor
 * @complexity O(n)
 */
export const parseValue: Parser<Value> = (cursor) => {
  const failures: Array<ParseError> = []
  for (const production of productions) {
    const result = production.parser(cursor)
    if (Either.isRight(result)) {
      return result
    }
    failures.push(result.left)
  }
  return Either.left(
    exhaustedAlternatives(cursor.offset, productionNames, mostSpecific(cursor.input, cursor.offset, failures))
  )
}

const documentValue: Parser<Value> = (cursor) => {
  const value = parseValue(skipSpace(cursor))
  if (Either.isLeft(value)) {
    return value
  }
  const rest = skipSpace(value.right.rest)
  if (!isAtEnd(rest)) {
    return Either.left(unexpectedToken(rest.offset, ["end of input"], describeFound(rest.input, rest.offset)))
  }
  return ok(value.right.value, rest)
}

/**
 * Parse a complete document: one value with optional surrounding whitespace.
 *
 * @param input - The whole document.
 * @returns The root value, or a single failure carrying an offset.
 *
 * @pure true
 * @invariant trailing content after the root value is rejected
 * @complexity O(n)
 */
export const parseDocument = (input: string): Either.Either<Value, ParseError> =>
  Either.map(documentValue(cursorAt(input)), (parsed) => parsed.value)

export const combinatorParser: DocumentParser = {
  name: "combinator",
  parse: parseDocument
}
