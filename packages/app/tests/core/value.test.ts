import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  jsonArray,
  jsonBool,
  jsonFloat,
  jsonInt,
  jsonNull,
  jsonObject,
  jsonString,
  valueEquals
} from "../../src/core/value.js"

describe("value tree", () => {
  it.effect("keeps the last value of a repeated key", () =>
    Effect.sync(() => {
      const value = jsonObject([["a", jsonInt(1n)], ["b", jsonNull], ["a", jsonInt(2n)]])
      expect(value._tag).toBe("Object")
      if (value._tag === "Object") {
        expect(value.entries.size).toBe(2)
        expect(value.entries.get("a")).toEqual(jsonInt(2n))
      }
    }))

  it.effect("ignores key order when comparing objects", () =>
    Effect.sync(() => {
      const left = jsonObject([["x", jsonBool(true)], ["y", jsonString("s")]])
      const right = jsonObject([["y", jsonString("s")], ["x", jsonBool(true)]])
      expect(valueEquals(left, right)).toBe(true)
    }))

  it.effect("keeps array order significant", () =>
    Effect.sync(() => {
      const left = jsonArray([jsonInt(1n), jsonInt(2n)])
      const right = jsonArray([jsonInt(2n), jsonInt(1n)])
      expect(valueEquals(left, right)).toBe(false)
      expect(valueEquals(left, jsonArray([jsonInt(1n), jsonInt(2n)]))).toBe(true)
    }))

  it.effect("distinguishes Int from Float of the same magnitude", () =>
    Effect.sync(() => {
      expect(valueEquals(jsonInt(1n), jsonFloat(1))).toBe(false)
      expect(valueEquals(jsonFloat(0), jsonFloat(-0))).toBe(false)
      expect(valueEquals(jsonFloat(2.5), jsonFloat(2.5))).toBe(true)
    }))

  it.effect("compares nested containers structurally", () =>
    Effect.sync(() => {
      const build = (last: bigint) =>
        jsonObject([["list", jsonArray([jsonNull, jsonObject([["n", jsonInt(last)]])])]])
      expect(valueEquals(build(1n), build(1n))).toBe(true)
      expect(valueEquals(build(1n), build(2n))).toBe(false)
      expect(valueEquals(jsonObject([["a", jsonNull]]), jsonObject([["b", jsonNull]]))).toBe(false)
    }))
})
