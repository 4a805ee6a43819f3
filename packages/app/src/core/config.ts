import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: concurrency ≥ 1 and timeoutMs ≥ 1
// COMPLEXITY: O(1)/O(1)

export const CONFIG_FILE_NAME = ".dep-drift.json"

export interface FileConfig {
  readonly concurrency?: number
  readonly timeoutMs?: number
  readonly deadlineMs?: number
  readonly includePrerelease?: boolean
  readonly npmRegistry?: string
  readonly pypiRegistry?: string
  readonly failOnOutdated?: boolean
}

export interface ResolvedConfig {
  readonly concurrency: number
  readonly timeoutMs: number
  readonly deadlineMs: number | undefined
  readonly includePrerelease: boolean
  readonly npmRegistry: string
  readonly pypiRegistry: string
  readonly failOnOutdated: boolean
}

export const defaultConfig: ResolvedConfig = {
  concurrency: 8,
  timeoutMs: 10_000,
  deadlineMs: undefined,
  includePrerelease: true,
  npmRegistry: "https://registry.npmjs.org",
  pypiRegistry: "https://pypi.org",
  failOnOutdated: false
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .dep-drift.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  concurrency: cli.concurrency ?? fileConfig?.concurrency ?? defaultConfig.concurrency,
  timeoutMs: cli.timeoutMs ?? fileConfig?.timeoutMs ?? defaultConfig.timeoutMs,
  deadlineMs: cli.deadlineMs ?? fileConfig?.deadlineMs ?? defaultConfig.deadlineMs,
  includePrerelease: cli.includePrerelease ?? fileConfig?.includePrerelease ?? defaultConfig.includePrerelease,
  npmRegistry: cli.npmRegistry ?? fileConfig?.npmRegistry ?? defaultConfig.npmRegistry,
  pypiRegistry: cli.pypiRegistry ?? fileConfig?.pypiRegistry ?? defaultConfig.pypiRegistry,
  failOnOutdated: cli.failOnOutdated ?? fileConfig?.failOnOutdated ?? defaultConfig.failOnOutdated
})
