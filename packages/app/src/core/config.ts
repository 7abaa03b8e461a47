import type { CliArgs } from "./cli.js"
import type { EngineName, OutputFormat } from "./types.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every resolved field is defined
// COMPLEXITY: O(1)/O(1)

export const defaultConfigPath = "./.jsonvrc.json"

export interface FileConfig {
  readonly engine?: EngineName
  readonly format?: OutputFormat
}

export interface ResolvedConfig {
  readonly engine: EngineName
  readonly format: OutputFormat
}

export const defaultConfig: ResolvedConfig = {
  engine: "combinator",
  format: "tree"
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .jsonvrc.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: Pick<CliArgs, "engine" | "format">,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  engine: cli.engine ?? fileConfig?.engine ?? defaultConfig.engine,
  format: cli.format ?? fileConfig?.format ?? defaultConfig.format
})
