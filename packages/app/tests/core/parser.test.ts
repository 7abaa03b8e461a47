import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  exhaustedAlternatives,
  invalidNumericLiteral,
  rootCause,
  unexpectedToken,
  unterminatedLiteral
} from "../../src/core/errors.js"
import { parseDocument, productionNames } from "../../src/core/parser.js"
import {
  jsonArray,
  jsonBool,
  jsonFloat,
  jsonInt,
  jsonNull,
  jsonObject,
  jsonString
} from "../../src/core/value.js"
import { settle } from "./test-helpers.js"

const allLabels = ["'null'", "'true'", "'false'", "'-'", "digit", "'\"'", "'['", "'{'"]

describe("combinator document parser", () => {
  it.effect("parses null", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("null"))).toEqual({ right: jsonNull })
    }))

  it.effect("parses booleans", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("true"))).toEqual({ right: jsonBool(true) })
      expect(settle(parseDocument("false"))).toEqual({ right: jsonBool(false) })
    }))

  it.effect("parses signed floats", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("123.45"))).toEqual({ right: jsonFloat(123.45) })
      expect(settle(parseDocument("-123.45"))).toEqual({ right: jsonFloat(-123.45) })
    }))

  it.effect("parses an array of integers", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("[1, 2, 3]"))).toEqual({
        right: jsonArray([jsonInt(1n), jsonInt(2n), jsonInt(3n)])
      })
    }))

  it.effect("parses an array of mixed values", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("[\"a\", null, 1]"))).toEqual({
        right: jsonArray([jsonString("a"), jsonNull, jsonInt(1n)])
      })
    }))

  it.effect("parses an object", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("{\"name\": \"John Doe\", \"age\": 30}"))).toEqual({
        right: jsonObject([["name", jsonString("John Doe")], ["age", jsonInt(30n)]])
      })
    }))

  it.effect("rejects an unrecognized token at a value position", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("{invalid}"))).toEqual({
        left: exhaustedAlternatives(0, productionNames, unexpectedToken(1, ["'\"'"], "'i'"))
      })
    }))

  it.effect("parses nested containers with surrounding whitespace", () =>
    Effect.sync(() => {
      const input = "\n  {\"a\": [1, {\"b\": null}],\n   \"c\": \"x\"}\t\n"
      expect(settle(parseDocument(input))).toEqual({
        right: jsonObject([
          ["a", jsonArray([jsonInt(1n), jsonObject([["b", jsonNull]])])],
          ["c", jsonString("x")]
        ])
      })
    }))

  it.effect("keeps the last value of a duplicated key", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("{\"a\": 1, \"a\": 2}"))).toEqual({ right: jsonObject([["a", jsonInt(2n)]]) })
    }))

  it.effect("rejects content after the root value", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("1 x"))).toEqual({ left: unexpectedToken(2, ["end of input"], "'x'") })
      expect(settle(parseDocument("1e10"))).toEqual({ left: unexpectedToken(1, ["end of input"], "'e'") })
      expect(settle(parseDocument("1."))).toEqual({ left: unexpectedToken(1, ["end of input"], "'.'") })
      expect(settle(parseDocument("\"a\\\"b\""))).toEqual({ left: unexpectedToken(4, ["end of input"], "'b'") })
    }))

  it.effect("rejects empty input with every expected token", () =>
    Effect.sync(() => {
      expect(settle(parseDocument(""))).toEqual({
        left: exhaustedAlternatives(0, productionNames, unexpectedToken(0, allLabels, "end of input"))
      })
    }))

  it.effect("wraps unterminated literals in the dispatcher failure", () =>
    Effect.sync(() => {
      expect(settle(parseDocument("\"abc"))).toEqual({
        left: exhaustedAlternatives(0, productionNames, unterminatedLiteral(0, "string"))
      })
      expect(settle(parseDocument("[1,"))).toEqual({
        left: exhaustedAlternatives(0, productionNames, unterminatedLiteral(0, "array"))
      })
    }))

  it.effect("surfaces numeric overflow as the root cause", () =>
    Effect.sync(() => {
      const literal = "99999999999999999999"
      const inner = invalidNumericLiteral(6, literal, "Int")
      const result = parseDocument(`{"k": ${literal}}`)
      expect(settle(result)).toEqual({
        left: exhaustedAlternatives(0, productionNames, exhaustedAlternatives(6, productionNames, inner))
      })
      if (result._tag === "Left") {
        expect(rootCause(result.left)).toEqual(inner)
      }
    }))

  it.effect("handles deeply nested arrays", () =>
    Effect.sync(() => {
      const depth = 200
      const result = parseDocument(`${"[".repeat(depth)}${"]".repeat(depth)}`)
      let expected = jsonArray([])
      for (let level = 1; level < depth; level++) {
        expected = jsonArray([expected])
      }
      expect(settle(result)).toEqual({ right: expected })
    }))
})
