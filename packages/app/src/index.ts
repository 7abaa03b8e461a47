// CHANGE: expose the parsing engines and value model as a library surface
// WHY: callers embed the parsers without going through the CLI
// REF: req-library-1
// SOURCE: n/a
// PURITY: CORE
// EFFECT: n/a

export { compareEngines, engines, parseWith } from "./core/engines.js"
export type {
  ExhaustedAlternatives,
  InvalidNumericLiteral,
  LiteralKind,
  NumericTarget,
  ParseError,
  UnexpectedToken,
  UnterminatedLiteral
} from "./core/errors.js"
export { rootCause } from "./core/errors.js"
export { runGrammar } from "./core/grammar/engine.js"
export type { GrammarFailure, Pair } from "./core/grammar/engine.js"
export { jsonGrammar } from "./core/grammar/json-grammar.js"
export type { JsonRule } from "./core/grammar/json-grammar.js"
export { parseWithGrammar } from "./core/grammar/parser.js"
export { builders } from "./core/grammar/rules.js"
export type { Expr, Grammar, RuleDef, RuleKind } from "./core/grammar/rules.js"
export { parseDocument, parseValue } from "./core/parser.js"
export { renderComparison, renderParseError, renderValue } from "./core/report.js"
export type { Comparison, DocumentParser, EngineName, OutputFormat } from "./core/types.js"
export { valueEquals } from "./core/value.js"
export type { JsonNumber, Value } from "./core/value.js"
