import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { cursorAt } from "../../src/core/cursor.js"
import { invalidNumericLiteral, unexpectedToken, unterminatedLiteral } from "../../src/core/errors.js"
import { parseBool, parseNull, parseNumber, parseString } from "../../src/core/primitives.js"
import { floatNumber, intNumber } from "../../src/core/value.js"
import { settle } from "./test-helpers.js"

describe("primitive parsers", () => {
  it.effect("recognizes null and booleans and consumes exactly their text", () =>
    Effect.sync(() => {
      expect(settle(parseNull(cursorAt("null,")))).toEqual({ right: { value: null, rest: cursorAt("null,", 4) } })
      expect(settle(parseBool(cursorAt("true")))).toEqual({ right: { value: true, rest: cursorAt("true", 4) } })
      expect(settle(parseBool(cursorAt("false]")))).toEqual({ right: { value: false, rest: cursorAt("false]", 5) } })
    }))

  it.effect("fails on a misspelled keyword without consuming input", () =>
    Effect.sync(() => {
      expect(settle(parseNull(cursorAt("nul")))).toEqual({ left: unexpectedToken(0, ["'null'"], "'n'") })
      expect(settle(parseBool(cursorAt("no")))).toEqual({ left: unexpectedToken(0, ["'true'", "'false'"], "'n'") })
    }))

  it.effect("chooses Float only when a fraction is written", () =>
    Effect.sync(() => {
      expect(settle(parseNumber(cursorAt("-12.50]")))).toEqual({
        right: { value: floatNumber(-12.5), rest: cursorAt("-12.50]", 6) }
      })
      expect(settle(parseNumber(cursorAt("42abc")))).toEqual({ right: { value: intNumber(42n), rest: cursorAt("42abc", 2) } })
    }))

  it.effect("leaves a bare dot and exponents unconsumed", () =>
    Effect.sync(() => {
      expect(settle(parseNumber(cursorAt("1.")))).toEqual({ right: { value: intNumber(1n), rest: cursorAt("1.", 1) } })
      expect(settle(parseNumber(cursorAt("1e10")))).toEqual({ right: { value: intNumber(1n), rest: cursorAt("1e10", 1) } })
    }))

  it.effect("reports where digits were missing", () =>
    Effect.sync(() => {
      expect(settle(parseNumber(cursorAt("x")))).toEqual({ left: unexpectedToken(0, ["'-'", "digit"], "'x'") })
      expect(settle(parseNumber(cursorAt("-x")))).toEqual({ left: unexpectedToken(1, ["digit"], "'x'") })
    }))

  it.effect("rejects integers that overflow", () =>
    Effect.sync(() => {
      expect(settle(parseNumber(cursorAt("99999999999999999999")))).toEqual({
        left: invalidNumericLiteral(0, "99999999999999999999", "Int")
      })
    }))

  it.effect("reads strings verbatim up to the next quote", () =>
    Effect.sync(() => {
      expect(settle(parseString(cursorAt("\"John Doe\"")))).toEqual({
        right: { value: "John Doe", rest: cursorAt("\"John Doe\"", 10) }
      })
      expect(settle(parseString(cursorAt("\"a\\\"b\"")))).toEqual({
        right: { value: "a\\", rest: cursorAt("\"a\\\"b\"", 4) }
      })
      expect(settle(parseString(cursorAt("\"\"")))).toEqual({ right: { value: "", rest: cursorAt("\"\"", 2) } })
    }))

  it.effect("reports unterminated strings at their opening quote", () =>
    Effect.sync(() => {
      expect(settle(parseString(cursorAt("\"abc")))).toEqual({ left: unterminatedLiteral(0, "string") })
      expect(settle(parseString(cursorAt("[ \"k", 2)))).toEqual({ left: unterminatedLiteral(2, "string") })
      expect(settle(parseString(cursorAt("x")))).toEqual({ left: unexpectedToken(0, ["'\"'"], "'x'") })
    }))
})
