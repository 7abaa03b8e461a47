import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { renderComparison, renderParseError, renderValue } from "../core/report.js"
import { loadConfigFile } from "../shell/config-file.js"
import { compareFile, parseFile } from "../shell/document.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0,2,3} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

export const exitCodes = {
  ok: 0,
  rejected: 2,
  disagreement: 3
} as const

const withNewline = (payload: string): string => payload.endsWith("\n") ? payload : `${payload}\n`

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(withNewline(payload))
  })

const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(withNewline(payload))
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  Either.isLeft(either) ? Effect.fail(either.left) : Effect.succeed(either.right)

const loadConfig = (cli: CliArgs): Effect.Effect<ResolvedConfig, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configPath = cli.configPath ?? defaultConfigPath
    const fileConfig = yield* _(loadConfigFile(configPath, cli.configPath !== undefined))
    const resolved = resolveConfig(cli, fileConfig)
    yield* _(
      Effect.logDebug("config resolved").pipe(
        Effect.annotateLogs({ engine: resolved.engine, format: resolved.format })
      )
    )
    return resolved
  })

const handleParse = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const { input, outcome } = yield* _(parseFile(cli.file, config.engine))
    if (Either.isLeft(outcome)) {
      const output = `${cli.file}: ${renderParseError(input, outcome.left)}`
      yield* _(writeStderr(output))
      return { output, exitCode: exitCodes.rejected }
    }
    const output = renderValue(outcome.right, config.format)
    yield* _(writeStdout(output))
    return { output, exitCode: exitCodes.ok }
  })

const handleCompare = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const { comparison, input } = yield* _(compareFile(cli.file))
    const output = renderComparison(input, comparison, config.format)
    yield* _(writeStdout(output))
    return { output, exitCode: comparison.agree ? exitCodes.ok : exitCodes.disagreement }
  })

const executeCommand = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const config = yield* _(loadConfig(cli))
    return yield* _(
      Match.value(cli.command).pipe(
        Match.when("parse", () => handleParse(cli, config)),
        Match.when("compare", () => handleCompare(cli, config)),
        Match.exhaustive
      )
    )
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = executeCommand(cli)
    return yield* _(
      cli.verbose ? program.pipe(Logger.withMinimumLogLevel(LogLevel.Debug)) : program
    )
  })
