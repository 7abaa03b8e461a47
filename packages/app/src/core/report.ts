import { Match } from "effect"
import * as Either from "effect/Either"

import { locate } from "./cursor.js"
import type { ParseError } from "./errors.js"
import type { Comparison, OutputFormat } from "./types.js"
import type { JsonNumber, Value } from "./value.js"

// CHANGE: render value trees, parse failures and engine comparisons for the terminal
// WHY: keep output formatting pure and deterministic across commands
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: renderValue(v, "compact") contains no line break
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rendering is a debug view of the tree, not JSON text
// COMPLEXITY: O(n) where n = number of nodes

const INDENT = "  "

const renderFloat = (value: number): string => {
  if (Object.is(value, -0)) {
    return "-0.0"
  }
  return Number.isInteger(value) ? value.toFixed(1) : String(value)
}

const renderNumber = (value: JsonNumber): string =>
  Match.value(value).pipe(
    Match.tag("Int", (number) => `Int(${number.value.toString()})`),
    Match.tag("Float", (number) => `Float(${renderFloat(number.value)})`),
    Match.exhaustive
  )

const quote = (text: string): string => `"${text}"`

const renderCompact = (value: Value): string =>
  Match.value(value).pipe(
    Match.tag("Null", () => "Null"),
    Match.tag("Bool", (bool) => `Bool(${String(bool.value)})`),
    Match.tag("Number", (number) => renderNumber(number.value)),
    Match.tag("String", (string) => `String(${quote(string.value)})`),
    Match.tag("Array", (array) => `Array([${array.items.map(renderCompact).join(", ")}])`),
    Match.tag("Object", (object) => {
      const members = [...object.entries].map(([key, member]) => `${quote(key)}: ${renderCompact(member)}`)
      return `Object({${members.join(", ")}})`
    }),
    Match.exhaustive
  )

const renderBlock = (
  head: string,
  open: string,
  close: string,
  lines: ReadonlyArray<string>,
  depth: number
): string => {
  if (lines.length === 0) {
    return `${head} ${open}${close}`
  }
  const inner = INDENT.repeat(depth + 1)
  const body = lines.map((line) => `${inner}${line},\n`).join("")
  return `${head} ${open}\n${body}${INDENT.repeat(depth)}${close}`
}

const renderTree = (value: Value, depth: number): string =>
  Match.value(value).pipe(
    Match.tag("Array", (array) =>
      renderBlock("Array", "[", "]", array.items.map((item) => renderTree(item, depth + 1)), depth)),
    Match.tag("Object", (object) =>
      renderBlock(
        "Object",
        "{",
        "}",
        [...object.entries].map(([key, member]) => `${quote(key)}: ${renderTree(member, depth + 1)}`),
        depth
      )),
    Match.orElse((leaf) => renderCompact(leaf))
  )

/**
 * Render a value tree.
 *
 * @param value - Root of the tree.
 * @param format - "tree" for an indented view, "compact" for one line.
 * @returns Rendered text without a trailing newline.
 *
 * @pure true
 * @invariant object members appear in map iteration order
 * @complexity O(n)
 */
export const renderValue = (value: Value, format: OutputFormat): string =>
  format === "compact" ? renderCompact(value) : renderTree(value, 0)

const at = (input: string, offset: number): string => {
  const location = locate(input, offset)
  return `${location.line}:${location.column}`
}

/**
 * Describe a parse failure with line:column positions.
 *
 * @pure true
 * @complexity O(n) where n = input length
 */
export const renderParseError = (input: string, error: ParseError): string =>
  Match.value(error).pipe(
    Match.tag("UnexpectedToken", (failure) =>
      failure.expected.length === 0
        ? `unexpected ${failure.found} at ${at(input, failure.offset)}`
        : `unexpected ${failure.found} at ${at(input, failure.offset)}, expected ${failure.expected.join(" or ")}`),
    Match.tag("UnterminatedLiteral", (failure) =>
      `unterminated ${failure.literal} starting at ${at(input, failure.offset)}`),
    Match.tag("InvalidNumericLiteral", (failure) =>
      `numeric literal ${failure.literal} at ${at(input, failure.offset)} does not fit ${
        failure.target === "Int" ? "a 64-bit signed integer" : "a finite 64-bit float"
      }`),
    Match.tag("ExhaustedAlternatives", (failure) => {
      const head = `no value at ${at(input, failure.offset)} (tried ${failure.attempted.join(", ")})`
      return failure.cause === undefined ? head : `${head}: ${renderParseError(input, failure.cause)}`
    }),
    Match.exhaustive
  )

/**
 * Render the outcome of every engine for one document.
 *
 * @pure true
 * @complexity O(n) per engine
 */
export const renderComparison = (
  input: string,
  comparison: Comparison,
  format: OutputFormat
): string => {
  const header = comparison.agree ? "engines agree" : "engines disagree"
  const lines = comparison.outcomes.map(({ engine, outcome }) =>
    Either.match(outcome, {
      onLeft: (error) => `[${engine}] error: ${renderParseError(input, error)}`,
      onRight: (value) => `[${engine}] ${renderValue(value, format)}`
    })
  )
  return [header, ...lines].join("\n")
}
