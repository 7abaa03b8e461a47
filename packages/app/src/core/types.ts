import type * as Either from "effect/Either"

import type { ParseError } from "./errors.js"
import type { Value } from "./value.js"

// CHANGE: define the capability both parsing techniques implement
// WHY: callers pick an engine without depending on how it recognizes input
// REF: req-engine-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ Engines, s: e.parse(s) ∈ Right(Value) ∪ Left(ParseError)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a failed parse never exposes a partial tree
// COMPLEXITY: O(1)/O(1)

export type EngineName = "combinator" | "grammar"

export const engineNames: ReadonlyArray<EngineName> = ["combinator", "grammar"]

export interface DocumentParser {
  readonly name: EngineName
  readonly parse: (input: string) => Either.Either<Value, ParseError>
}

export type OutputFormat = "tree" | "compact"

export type EngineOutcome = Either.Either<Value, ParseError>

export interface Comparison {
  readonly agree: boolean
  readonly outcomes: ReadonlyArray<{ readonly engine: EngineName; readonly outcome: EngineOutcome }>
}
