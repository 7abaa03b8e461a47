import * as Either from "effect/Either"

import { quoteToken } from "../errors.js"
import type { Expr, Grammar, RuleKind } from "./rules.js"

// CHANGE: interpret declarative rule sets into concrete parse trees
// WHY: recognition is generic; a grammar only declares productions
// REF: req-grammar-engine-1
// SOURCE: n/a
// FORMAT THEOREM: ∀g, r, s: run(g, r, s) = Right(ps) → ∀p ∈ ps: s.slice(p.start, p.end) = p.text
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: failure bookkeeping lives in one call's state; nothing is shared between runs
// COMPLEXITY: O(n · k) where k = alternatives retried at a position (no memoization)

export interface Pair<R extends string> {
  readonly rule: R
  readonly start: number
  readonly end: number
  readonly text: string
  readonly children: ReadonlyArray<Pair<R>>
}

export interface RuleFrame<R extends string> {
  readonly rule: R
  readonly start: number
}

/**
 * Furthest point any terminal failed at, what was expected there, and the
 * rules that were open when the first failure at that point was recorded.
 */
export interface GrammarFailure<R extends string> {
  readonly offset: number
  readonly expected: ReadonlyArray<string>
  readonly stack: ReadonlyArray<RuleFrame<R>>
}

interface Matched<R extends string> {
  readonly end: number
  readonly pairs: ReadonlyArray<Pair<R>>
}

interface RunState<R extends string> {
  readonly grammar: Grammar<R>
  readonly input: string
  readonly frames: Array<RuleFrame<R>>
  furthest: number
  expected: Array<string>
  stack: ReadonlyArray<RuleFrame<R>>
  quiet: number
}

const matchedEmpty = <R extends string>(end: number): Matched<R> => ({ end, pairs: [] })

const recordFailure = <R extends string>(state: RunState<R>, offset: number, label: string): undefined => {
  if (state.quiet > 0) {
    return undefined
  }
  if (offset > state.furthest) {
    state.furthest = offset
    state.expected = [label]
    state.stack = [...state.frames]
    return undefined
  }
  if (offset === state.furthest && !state.expected.includes(label)) {
    state.expected.push(label)
  }
  return undefined
}

// Inside atomic rules terminals are reported under the enclosing rule's name.
const terminalLabel = <R extends string>(state: RunState<R>, atomic: boolean, label: string): string => {
  const innermost = state.frames.at(-1)
  return atomic && innermost !== undefined ? innermost.rule : label
}

const skipWhitespace = <R extends string>(state: RunState<R>, offset: number): number => {
  const whitespace = state.grammar.whitespace
  if (whitespace === undefined) {
    return offset
  }
  state.quiet += 1
  let current = offset
  let matched = evaluate(state, whitespace, current, true)
  while (matched !== undefined && matched.end > current) {
    current = matched.end
    matched = evaluate(state, whitespace, current, true)
  }
  state.quiet -= 1
  return current
}

const evaluateRepeat = <R extends string>(
  state: RunState<R>,
  expr: Expr<R>,
  min: number,
  offset: number,
  atomic: boolean
): Matched<R> | undefined => {
  const pairs: Array<Pair<R>> = []
  let current = offset
  let count = 0
  let more = true
  while (more) {
    const from = count > 0 && !atomic ? skipWhitespace(state, current) : current
    const matched = evaluate(state, expr, from, atomic)
    more = matched !== undefined && matched.end > from
    if (matched !== undefined) {
      pairs.push(...matched.pairs)
      current = matched.end
      count += 1
    }
  }
  return count >= min ? { end: current, pairs } : undefined
}

const emitPair = <R extends string>(
  state: RunState<R>,
  rule: R,
  kind: RuleKind,
  offset: number,
  matched: Matched<R>
): Matched<R> => ({
  end: matched.end,
  pairs: [{
    rule,
    start: offset,
    end: matched.end,
    text: state.input.slice(offset, matched.end),
    children: kind === "atomic" ? [] : matched.pairs
  }]
})

// Refs, sequences and optional sequence items are evaluated in place, so a
// nested JSON container costs five frames of this function.
const evaluate = <R extends string>(
  state: RunState<R>,
  expr: Expr<R>,
  offset: number,
  atomic: boolean
): Matched<R> | undefined => {
  const { input } = state
  switch (expr._tag) {
    case "Literal":
      return input.startsWith(expr.text, offset)
        ? matchedEmpty(offset + expr.text.length)
        : recordFailure(state, offset, terminalLabel(state, atomic, quoteToken(expr.text)))
    case "CharRange": {
      const char = input.charAt(offset)
      return offset < input.length && char >= expr.from && char <= expr.to
        ? matchedEmpty(offset + 1)
        : recordFailure(state, offset, terminalLabel(state, atomic, `${quoteToken(expr.from)}..${quoteToken(expr.to)}`))
    }
    case "Any":
      return offset < input.length
        ? matchedEmpty(offset + 1)
        : recordFailure(state, offset, terminalLabel(state, atomic, "any character"))
    case "Start":
      return offset === 0 ? matchedEmpty(offset) : recordFailure(state, offset, "start of input")
    case "End":
      return offset === input.length ? matchedEmpty(offset) : recordFailure(state, offset, "end of input")
    case "Seq": {
      const pairs: Array<Pair<R>> = []
      let current = offset
      let first = true
      for (const item of expr.items) {
        const from = first || atomic ? current : skipWhitespace(state, current)
        first = false
        const matched = item._tag === "Optional"
          ? evaluate(state, item.expr, from, atomic) ?? matchedEmpty<R>(from)
          : evaluate(state, item, from, atomic)
        if (matched === undefined) {
          return undefined
        }
        pairs.push(...matched.pairs)
        current = matched.end
      }
      return { end: current, pairs }
    }
    case "Choice": {
      for (const option of expr.options) {
        const matched = evaluate(state, option, offset, atomic)
        if (matched !== undefined) {
          return matched
        }
      }
      return undefined
    }
    case "Repeat":
      return evaluateRepeat(state, expr.expr, expr.min, offset, atomic)
    case "Optional":
      return evaluate(state, expr.expr, offset, atomic) ?? matchedEmpty(offset)
    case "Not": {
      state.quiet += 1
      const matched = evaluate(state, expr.expr, offset, atomic)
      state.quiet -= 1
      return matched === undefined ? matchedEmpty(offset) : undefined
    }
    case "Ref": {
      const { kind, expr: body } = state.grammar.rules[expr.rule]
      const emits = kind !== "silent"
      if (emits) {
        state.frames.push({ rule: expr.rule, start: offset })
      }
      const matched = evaluate(state, body, offset, atomic || kind === "atomic" || kind === "compound")
      if (emits) {
        state.frames.pop()
      }
      return matched === undefined || !emits ? matched : emitPair(state, expr.rule, kind, offset, matched)
    }
  }
}

/**
 * Run a grammar from an entry rule over the whole input.
 *
 * @param grammar - Rule set to interpret.
 * @param rule - Entry rule.
 * @param input - Document text.
 * @returns The top-level nodes, or the furthest failure.
 *
 * @pure true
 * @invariant a failed run returns no nodes
 * @complexity O(n · k)
 */
export const runGrammar = <R extends string>(
  grammar: Grammar<R>,
  rule: R,
  input: string
): Either.Either<ReadonlyArray<Pair<R>>, GrammarFailure<R>> => {
  const state: RunState<R> = {
    grammar,
    input,
    frames: [],
    furthest: -1,
    expected: [],
    stack: [],
    quiet: 0
  }
  const matched = evaluate(state, { _tag: "Ref", rule }, 0, false)
  if (matched === undefined) {
    return Either.left({
      offset: Math.max(state.furthest, 0),
      expected: state.expected,
      stack: state.stack
    })
  }
  return Either.right(matched.pairs)
}
