import * as Either from "effect/Either"

import { describeFound } from "../cursor.js"
import type { LiteralKind, ParseError } from "../errors.js"
import { exhaustedAlternatives, unexpectedToken, unterminatedLiteral } from "../errors.js"
import { productionNames } from "../parser.js"
import type { DocumentParser } from "../types.js"
import type { Value } from "../value.js"
import { convertPair } from "./convert.js"
import type { GrammarFailure, RuleFrame } from "./engine.js"
import { runGrammar } from "./engine.js"
import type { JsonRule } from "./json-grammar.js"
import { jsonGrammar } from "./json-grammar.js"

// CHANGE: expose the grammar engine as a DocumentParser
// WHY: both parsing techniques report failures with the same taxonomy
// REF: req-grammar-parser-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: grammarParser.parse(s) ∈ Right(Value) ↔ combinatorParser.parse(s) ∈ Right(Value)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: recognition and conversion run as two separate passes
// COMPLEXITY: O(n · k)

const isLiteralKind = (rule: JsonRule): rule is LiteralKind =>
  rule === "string" || rule === "array" || rule === "object"

const innermostLiteral = (
  stack: ReadonlyArray<RuleFrame<JsonRule>>
): { readonly rule: LiteralKind; readonly start: number } | undefined => {
  for (let index = stack.length - 1; index >= 0; index--) {
    const frame = stack[index]
    if (frame !== undefined && isLiteralKind(frame.rule)) {
      return { rule: frame.rule, start: frame.start }
    }
  }
  return undefined
}

// True when a value was being parsed at the failure offset and none of its
// alternatives got past their first token.
const valueStartsAt = (stack: ReadonlyArray<RuleFrame<JsonRule>>, offset: number): boolean => {
  const index = stack.map((frame) => frame.rule).lastIndexOf("value")
  return index >= 0 && stack.slice(index).every((frame) => frame.start === offset)
}

/**
 * Map the furthest grammar failure onto the shared ParseError taxonomy.
 *
 * @pure true
 * @complexity O(d) where d = rule stack depth
 */
export const toParseError = (input: string, failure: GrammarFailure<JsonRule>): ParseError => {
  const found = describeFound(input, failure.offset)
  const open = innermostLiteral(failure.stack)
  if (failure.offset >= input.length && open !== undefined) {
    return unterminatedLiteral(open.start, open.rule)
  }
  const unexpected = unexpectedToken(failure.offset, failure.expected, found)
  return valueStartsAt(failure.stack, failure.offset)
    ? exhaustedAlternatives(failure.offset, productionNames, unexpected)
    : unexpected
}

/**
 * Parse a complete document with the declarative JSON grammar.
 *
 * @param input - The whole document.
 * @returns The root value or a single failure.
 *
 * @pure true
 * @complexity O(n · k)
 */
export const parseWithGrammar = (input: string): Either.Either<Value, ParseError> => {
  const tree = runGrammar(jsonGrammar, "json", input)
  if (Either.isLeft(tree)) {
    return Either.left(toParseError(input, tree.left))
  }
  const [root] = tree.right
  if (root === undefined) {
    return Either.left(unexpectedToken(0, ["value"], describeFound(input, 0)))
  }
  return convertPair(root)
}

export const grammarParser: DocumentParser = {
  name: "grammar",
  parse: parseWithGrammar
}
