import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { fileError } from "../../src/core/errors.js"
import { loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir } from "./test-helpers.js"

describe("loadConfigFile", () => {
  it.effect("decodes engine and format", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const configPath = yield* _(writeFixture(".jsonvrc.json", `{"engine": "grammar", "format": "compact"}`))
        const config = yield* _(loadConfigFile(configPath, true))
        expect(config).toEqual({ engine: "grammar", format: "compact" })
      })
    ).pipe(provideNodeContext))

  it.effect("leaves unset fields out", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const configPath = yield* _(writeFixture(".jsonvrc.json", `{}`))
        const config = yield* _(loadConfigFile(configPath, false))
        expect(config).toEqual({})
      })
    ).pipe(provideNodeContext))

  it.effect("ignores a missing default config", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const config = yield* _(loadConfigFile(path.join(tempDir, ".jsonvrc.json"), false))
        expect(config).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.effect("fails on a missing explicit config", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, "missing.json")
        const result = yield* _(Effect.either(loadConfigFile(configPath, true)))
        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left).toEqual(fileError(`Config file not found: ${configPath}`))
        }
      })
    ).pipe(provideNodeContext))

  it.effect("rejects unknown engines", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const configPath = yield* _(writeFixture(".jsonvrc.json", `{"engine": "fast"}`))
        const result = yield* _(Effect.either(loadConfigFile(configPath, true)))
        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left._tag).toBe("ConfigError")
        }
      })
    ).pipe(provideNodeContext))

  it.effect("rejects malformed JSON", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const configPath = yield* _(writeFixture(".jsonvrc.json", `{"engine": `))
        const result = yield* _(Effect.either(loadConfigFile(configPath, true)))
        expect(Either.isLeft(result) && result.left._tag).toBe("ConfigError")
      })
    ).pipe(provideNodeContext))
})
