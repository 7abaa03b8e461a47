import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { runGrammar } from "../../../src/core/grammar/engine.js"
import { jsonGrammar } from "../../../src/core/grammar/json-grammar.js"
import type { Grammar } from "../../../src/core/grammar/rules.js"
import { builders } from "../../../src/core/grammar/rules.js"

type ListRule = "list" | "word" | "sep"

const { end, lit, plus, range, ref, rule, seq, star, start } = builders<ListRule>()

// Comma-separated lowercase words with optional spaces between tokens.
const listGrammar: Grammar<ListRule> = {
  whitespace: lit(" "),
  rules: {
    list: rule("normal", seq(start, ref("word"), star(seq(ref("sep"), ref("word"))), end)),
    word: rule("atomic", plus(range("a", "z"))),
    sep: rule("silent", lit(","))
  }
}

describe("grammar engine", () => {
  it.effect("builds one node per emitting rule with source spans", () =>
    Effect.sync(() => {
      const result = runGrammar(listGrammar, "list", "ab ,cd")
      expect(Either.isRight(result)).toBe(true)
      if (Either.isRight(result)) {
        const [list] = result.right
        expect(result.right).toHaveLength(1)
        expect(list?.rule).toBe("list")
        expect(list?.text).toBe("ab ,cd")
        expect(list?.children.map((child) => [child.rule, child.start, child.end, child.text])).toEqual([
          ["word", 0, 2, "ab"],
          ["word", 4, 6, "cd"]
        ])
      }
    }))

  it.effect("does not skip whitespace inside atomic rules", () =>
    Effect.sync(() => {
      const result = runGrammar(listGrammar, "list", "a b")
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left).toEqual({
          offset: 2,
          expected: ["','", "end of input"],
          stack: [{ rule: "list", start: 0 }]
        })
      }
    }))

  it.effect("reports the furthest failure with the rules open there", () =>
    Effect.sync(() => {
      const result = runGrammar(listGrammar, "list", "ab, 1")
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left).toEqual({
          offset: 4,
          expected: ["word"],
          stack: [{ rule: "list", start: 0 }, { rule: "word", start: 4 }]
        })
      }
    }))

  it.effect("emits the JSON parse tree below the silent entry rule", () =>
    Effect.sync(() => {
      const result = runGrammar(jsonGrammar, "json", "  [1, \"a\"] ")
      expect(Either.isRight(result)).toBe(true)
      if (Either.isRight(result)) {
        const [value] = result.right
        expect(value?.rule).toBe("value")
        expect([value?.start, value?.end]).toEqual([2, 10])
        const [array] = value?.children ?? []
        expect(array?.rule).toBe("array")
        const items = array?.children ?? []
        expect(items.map((item) => item.children.map((child) => [child.rule, child.text]))).toEqual([
          [["number", "1"]],
          [["string", "\"a\""]]
        ])
        const string = items[1]?.children[0]
        expect(string?.children.map((child) => [child.rule, child.text])).toEqual([["chars", "a"]])
        expect(items[0]?.children[0]?.children).toEqual([])
      }
    }))
})
