import * as Either from "effect/Either"

import type { ParseError } from "./errors.js"
import { grammarParser } from "./grammar/parser.js"
import { combinatorParser } from "./parser.js"
import type { Comparison, DocumentParser, EngineName } from "./types.js"
import { engineNames } from "./types.js"
import type { Value } from "./value.js"
import { valueEquals } from "./value.js"

// CHANGE: register the two parsing techniques behind one capability
// WHY: the CLI and tests select an engine by name and compare their outcomes
// REF: req-engines-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: compare(s).agree ↔ (both reject s) ∨ valueEquals(combinator(s), grammar(s))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: engines[name].name = name
// COMPLEXITY: O(n)

export const engines: { readonly [K in EngineName]: DocumentParser } = {
  combinator: combinatorParser,
  grammar: grammarParser
}

export const parseWith = (engine: EngineName, input: string): Either.Either<Value, ParseError> =>
  engines[engine].parse(input)

const sameOutcome = (
  left: Either.Either<Value, ParseError>,
  right: Either.Either<Value, ParseError>
): boolean => {
  if (Either.isRight(left) && Either.isRight(right)) {
    return valueEquals(left.right, right.right)
  }
  return Either.isLeft(left) && Either.isLeft(right)
}

/**
 * Parse one document with every engine.
 *
 * Engines agree when they build equal trees or when they all reject the
 * input; failure details are allowed to differ.
 *
 * @pure true
 * @complexity O(n) per engine
 */
export const compareEngines = (input: string): Comparison => {
  const outcomes = engineNames.map((engine) => ({ engine, outcome: parseWith(engine, input) }))
  const [first, ...others] = outcomes
  const agree = first === undefined || others.every((other) => sameOutcome(first.outcome, other.outcome))
  return { agree, outcomes }
}
