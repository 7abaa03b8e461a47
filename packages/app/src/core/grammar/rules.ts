// CHANGE: describe grammars as data instead of code
// WHY: the grammar engine interprets rule sets, keeping the grammar apart from recognition
// REF: req-grammar-rules-1
// SOURCE: n/a
// FORMAT THEOREM: ∀g ∈ Grammar<R>: every Ref in g names a key of g.rules
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rule names are a closed union R, so references are checked at compile time
// COMPLEXITY: O(1)/O(1)

export type Expr<R extends string> =
  | { readonly _tag: "Literal"; readonly text: string }
  | { readonly _tag: "CharRange"; readonly from: string; readonly to: string }
  | { readonly _tag: "Any" }
  | { readonly _tag: "Start" }
  | { readonly _tag: "End" }
  | { readonly _tag: "Seq"; readonly items: ReadonlyArray<Expr<R>> }
  | { readonly _tag: "Choice"; readonly options: ReadonlyArray<Expr<R>> }
  | { readonly _tag: "Repeat"; readonly expr: Expr<R>; readonly min: number }
  | { readonly _tag: "Optional"; readonly expr: Expr<R> }
  | { readonly _tag: "Not"; readonly expr: Expr<R> }
  | { readonly _tag: "Ref"; readonly rule: R }

/**
 * How a rule takes part in the parse tree:
 * - normal: emits a node; whitespace is skipped between sequence items and repetitions
 * - silent: emits no node of its own
 * - atomic: emits a node without children; no implicit whitespace here or in callees
 * - compound: like atomic but keeps the nodes of the rules it calls
 */
export type RuleKind = "normal" | "silent" | "atomic" | "compound"

export interface RuleDef<R extends string> {
  readonly kind: RuleKind
  readonly expr: Expr<R>
}

export interface Grammar<R extends string> {
  readonly rules: { readonly [K in R]: RuleDef<R> }
  readonly whitespace: Expr<R> | undefined
}

export interface GrammarBuilders<R extends string> {
  readonly lit: (text: string) => Expr<R>
  readonly range: (from: string, to: string) => Expr<R>
  readonly any: Expr<R>
  readonly start: Expr<R>
  readonly end: Expr<R>
  readonly seq: (...items: ReadonlyArray<Expr<R>>) => Expr<R>
  readonly choice: (...options: ReadonlyArray<Expr<R>>) => Expr<R>
  readonly star: (expr: Expr<R>) => Expr<R>
  readonly plus: (expr: Expr<R>) => Expr<R>
  readonly opt: (expr: Expr<R>) => Expr<R>
  readonly not: (expr: Expr<R>) => Expr<R>
  readonly ref: (rule: R) => Expr<R>
  readonly rule: (kind: RuleKind, expr: Expr<R>) => RuleDef<R>
}

/**
 * Expression constructors bound to one set of rule names.
 *
 * @pure true
 */
export const builders = <R extends string>(): GrammarBuilders<R> => ({
  lit: (text) => ({ _tag: "Literal", text }),
  range: (from, to) => ({ _tag: "CharRange", from, to }),
  any: { _tag: "Any" },
  start: { _tag: "Start" },
  end: { _tag: "End" },
  seq: (...items) => ({ _tag: "Seq", items }),
  choice: (...options) => ({ _tag: "Choice", options }),
  star: (expr) => ({ _tag: "Repeat", expr, min: 0 }),
  plus: (expr) => ({ _tag: "Repeat", expr, min: 1 }),
  opt: (expr) => ({ _tag: "Optional", expr }),
  not: (expr) => ({ _tag: "Not", expr }),
  ref: (rule) => ({ _tag: "Ref", rule }),
  rule: (kind, expr) => ({ kind, expr })
})
