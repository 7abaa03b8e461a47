import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import { compareEngines, parseWith } from "../core/engines.js"
import type { AppError } from "../core/errors.js"
import { fileError, parseAborted } from "../core/errors.js"
import type { Comparison, EngineName, EngineOutcome } from "../core/types.js"

// CHANGE: read documents from disk and run the parsing engines on them
// WHY: isolate filesystem IO and runtime failures from the pure parsers
// REF: req-document-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: parseFile(p) = Right(o) → o.outcome = parseWith(engine, read(p))
// PURITY: SHELL
// EFFECT: Effect<ParsedDocument, AppError, FileSystem>
// INVARIANT: a document is read exactly once per command
// COMPLEXITY: O(n)

export interface ParsedDocument {
  readonly input: string
  readonly outcome: EngineOutcome
}

export interface ComparedDocument {
  readonly input: string
  readonly comparison: Comparison
}

export const readDocument = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const input = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(
      Effect.logDebug("document read").pipe(
        Effect.annotateLogs({ path, length: input.length })
      )
    )
    return input
  })

// Deep nesting can exhaust the call stack of the recursive parsers.
const guarded = <A>(path: string, run: () => A): Effect.Effect<A, AppError> =>
  Effect.try({
    try: run,
    catch: (error) => parseAborted(path, error instanceof Error ? error.message : String(error))
  })

/**
 * Parse one file with the selected engine.
 *
 * @param path - Document location.
 * @param engine - Engine that builds the tree.
 * @returns The document text and the engine's outcome.
 *
 * @pure false
 * @effect FileSystem
 * @invariant a rejected document is a successful Effect carrying Left
 * @complexity O(n)
 */
export const parseFile = (
  path: string,
  engine: EngineName
): Effect.Effect<ParsedDocument, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const input = yield* _(readDocument(path))
    const outcome = yield* _(guarded(path, () => parseWith(engine, input)))
    yield* _(
      Effect.logDebug("document parsed").pipe(
        Effect.annotateLogs({ engine, accepted: Either.isRight(outcome) })
      )
    )
    return { input, outcome }
  })

export const compareFile = (
  path: string
): Effect.Effect<ComparedDocument, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const input = yield* _(readDocument(path))
    const comparison = yield* _(guarded(path, () => compareEngines(input)))
    yield* _(
      Effect.logDebug("engines compared").pipe(Effect.annotateLogs("agree", comparison.agree))
    )
    return { input, comparison }
  })
