import type { Grammar } from "./rules.js"
import { builders } from "./rules.js"

// CHANGE: declare the JSON value grammar as a rule set
// WHY: the same productions as the combinator engine, written declaratively
// REF: req-json-grammar-1
// SOURCE: n/a
// FORMAT THEOREM: L(jsonGrammar.json) = L(parseDocument)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: value alternatives keep the order null, bool, number, string, array, object
// COMPLEXITY: O(1)/O(1)

export type JsonRule =
  | "json"
  | "value"
  | "null"
  | "bool"
  | "number"
  | "string"
  | "chars"
  | "array"
  | "object"
  | "pair"

const { any, choice, end, lit, not, opt, plus, range, ref, rule, seq, star, start } = builders<JsonRule>()

const digit = range("0", "9")

// PEG notation; (silent), (atomic) and (compound) mark the rule kind.
//   json   <- START value END                        (silent)
//   value  <- null / bool / number / string / array / object
//   null   <- "null"
//   bool   <- "true" / "false"
//   number <- "-"? [0-9]+ ("." [0-9]+)?              (atomic)
//   string <- "\"" chars "\""                          (compound)
//   chars  <- (!"\"" .)*                               (atomic)
//   array  <- "[" (value ("," value)*)? "]"
//   object <- "{" pair ("," pair)* "}"
//   pair   <- string ":" value
export const jsonGrammar: Grammar<JsonRule> = {
  whitespace: choice(lit(" "), lit("\t"), lit("\r"), lit("\n")),
  rules: {
    json: rule("silent", seq(start, ref("value"), end)),
    value: rule(
      "normal",
      choice(ref("null"), ref("bool"), ref("number"), ref("string"), ref("array"), ref("object"))
    ),
    null: rule("normal", lit("null")),
    bool: rule("normal", choice(lit("true"), lit("false"))),
    number: rule("atomic", seq(opt(lit("-")), plus(digit), opt(seq(lit("."), plus(digit))))),
    string: rule("compound", seq(lit("\""), ref("chars"), lit("\""))),
    chars: rule("atomic", star(seq(not(lit("\"")), any))),
    array: rule("normal", seq(lit("["), opt(seq(ref("value"), star(seq(lit(","), ref("value"))))), lit("]"))),
    object: rule("normal", seq(lit("{"), ref("pair"), star(seq(lit(","), ref("pair"))), lit("}"))),
    pair: rule("normal", seq(ref("string"), lit(":"), ref("value")))
  }
}
