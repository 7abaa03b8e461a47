import { Match } from "effect"
import * as Either from "effect/Either"

import type { CliError } from "./errors.js"
import { cliError } from "./errors.js"
import type { EngineName, OutputFormat } from "./types.js"

// CHANGE: implement deterministic CLI parsing for jsonv
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and extra positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "parse" | "compare"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly engine: EngineName | undefined
  readonly format: OutputFormat | undefined
  readonly configPath: string | undefined
  readonly verbose: boolean
}

interface PartialArgs {
  readonly command: CliCommand
  readonly file: string | undefined
  readonly engine: EngineName | undefined
  readonly format: OutputFormat | undefined
  readonly configPath: string | undefined
  readonly verbose: boolean
}

interface FlagStep {
  readonly next: PartialArgs
  readonly consumed: number
}

const isFlag = (value: string): boolean => value.startsWith("-") && value !== "-"

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("parse", () => Either.right<CliCommand>("parse")),
    Match.when("compare", () => Either.right<CliCommand>("compare")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const parseEngine = (value: string): Either.Either<EngineName, CliError> =>
  Match.value(value).pipe(
    Match.when("combinator", () => Either.right<EngineName>("combinator")),
    Match.when("grammar", () => Either.right<EngineName>("grammar")),
    Match.orElse(() => Either.left(cliError(`Unknown engine: ${value}`)))
  )

const parseFormat = (value: string): Either.Either<OutputFormat, CliError> =>
  Match.value(value).pipe(
    Match.when("tree", () => Either.right<OutputFormat>("tree")),
    Match.when("compact", () => Either.right<OutputFormat>("compact")),
    Match.orElse(() => Either.left(cliError(`Unknown format: ${value}`)))
  )

const defaultArgs = (command: CliCommand): PartialArgs => ({
  command,
  file: undefined,
  engine: undefined,
  format: undefined,
  configPath: undefined,
  verbose: false
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = <A>(
  flagName: string,
  current: PartialArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: PartialArgs, value: A) => PartialArgs
): Either.Either<FlagStep, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: PartialArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, CliError>

const flagParsers: Record<string, FlagParser> = {
  verbose: (current) => Either.right({ next: { ...current, verbose: true }, consumed: 1 }),
  // compare always runs every engine
  engine: (current, inlineValue, nextValue) =>
    current.command === "compare"
      ? Either.left(cliError("--engine is not accepted by compare"))
      : parseValueFlag("engine", current, inlineValue, nextValue, parseEngine, (args, engine) => ({
        ...args,
        engine
      })),
  format: (current, inlineValue, nextValue) =>
    parseValueFlag("format", current, inlineValue, nextValue, parseFormat, (args, format) => ({
      ...args,
      format
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, Either.right, (args, configPath) => ({
      ...args,
      configPath
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: PartialArgs
): Either.Either<FlagStep, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parsePositional = (value: string, current: PartialArgs): Either.Either<FlagStep, CliError> =>
  current.file === undefined
    ? Either.right({ next: { ...current, file: value }, consumed: 1 })
    : Either.left(cliError(`Unexpected positional argument: ${value}`))

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "parse", startIndex: 0 })
  }
  const commandEither = parseCommand(first)
  if (Either.isLeft(commandEither)) {
    // A bare file name selects the default command.
    return Either.right({ command: "parse", startIndex: 0 })
  }
  return Either.right({ command: commandEither.right, startIndex: 1 })
}

const parseArgs = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: PartialArgs
): Either.Either<PartialArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    const parsed = isFlag(current)
      ? parseFlag(current, rawArgs[index + 1], args)
      : parsePositional(current, args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const requireFile = (args: PartialArgs): Either.Either<CliArgs, CliError> =>
  args.file === undefined
    ? Either.left(cliError(`Missing input file for ${args.command}`))
    : Either.right({ ...args, file: args.file })

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to parse when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return Either.flatMap(parseArgs(rawArgs, parsed.startIndex, defaultArgs(parsed.command)), requireFile)
}
