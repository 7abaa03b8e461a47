// CHANGE: unify the failure algebra of parsing and of the CLI program
// WHY: every failure is a value with a stable tag and a position
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ ParseError: e.offset is an index into the parsed input
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique and exhaustively matchable
// COMPLEXITY: O(1)/O(1)

export type LiteralKind = "string" | "array" | "object"

export type NumericTarget = "Int" | "Float"

export type UnexpectedToken = {
  readonly _tag: "UnexpectedToken"
  readonly offset: number
  readonly expected: ReadonlyArray<string>
  readonly found: string
}

export type UnterminatedLiteral = {
  readonly _tag: "UnterminatedLiteral"
  readonly offset: number
  readonly literal: LiteralKind
}

export type InvalidNumericLiteral = {
  readonly _tag: "InvalidNumericLiteral"
  readonly offset: number
  readonly literal: string
  readonly target: NumericTarget
}

export type ExhaustedAlternatives = {
  readonly _tag: "ExhaustedAlternatives"
  readonly offset: number
  readonly attempted: ReadonlyArray<string>
  readonly cause: ParseError | undefined
}

export type ParseError =
  | UnexpectedToken
  | UnterminatedLiteral
  | InvalidNumericLiteral
  | ExhaustedAlternatives

export const quoteToken = (text: string): string => `'${text}'`

export const unexpectedToken = (
  offset: number,
  expected: ReadonlyArray<string>,
  found: string
): UnexpectedToken => ({
  _tag: "UnexpectedToken",
  offset,
  expected,
  found
})

export const unterminatedLiteral = (offset: number, literal: LiteralKind): UnterminatedLiteral => ({
  _tag: "UnterminatedLiteral",
  offset,
  literal
})

export const invalidNumericLiteral = (
  offset: number,
  literal: string,
  target: NumericTarget
): InvalidNumericLiteral => ({
  _tag: "InvalidNumericLiteral",
  offset,
  literal,
  target
})

export const exhaustedAlternatives = (
  offset: number,
  attempted: ReadonlyArray<string>,
  cause: ParseError | undefined
): ExhaustedAlternatives => ({
  _tag: "ExhaustedAlternatives",
  offset,
  attempted,
  cause
})

/**
 * Follow ExhaustedAlternatives wrappers down to the innermost failure.
 *
 * @pure true
 * @complexity O(d) where d = wrapping depth
 */
export const rootCause = (error: ParseError): ParseError => {
  let current = error
  while (current._tag === "ExhaustedAlternatives" && current.cause !== undefined) {
    current = current.cause
  }
  return current
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseAborted = { readonly _tag: "ParseAborted"; readonly file: string; readonly message: string }

export type AppError = CliError | ConfigError | FileError | ParseAborted

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseAborted = (file: string, message: string): ParseAborted => ({
  _tag: "ParseAborted",
  file,
  message
})
