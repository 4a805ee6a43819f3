import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

import type { CliArgs } from "../core/cli.js"
import { cliError, parseCliArgs } from "../core/cli.js"
import { CONFIG_FILE_NAME, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { hasMalformed, hasOutdated, renderJsonReport, renderMarkdownReport } from "../core/report.js"
import type { Report } from "../core/types.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readManifestSources } from "../shell/manifest-file.js"
import { makePackageIndexes, RegistryTransport } from "../shell/registry.js"
import { readReportFile, writeReportFile } from "../shell/report-file.js"
import { runPipeline } from "./pipeline.js"

// CHANGE: orchestrate check and render with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0,1,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path | RegistryTransport>
// INVARIANT: report emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly report: Report
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService | RegistryTransport

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitReport = (
  report: Report,
  cli: CliArgs
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const payload = cli.json ? renderJsonReport(report) : renderMarkdownReport(report)
    if (cli.outputPath !== undefined) {
      yield* _(writeReportFile(cli.outputPath, payload))
      yield* _(Effect.logInfo(`report written to ${cli.outputPath}`))
    }
    if (!cli.silent) {
      yield* _(writeStdout(payload))
    }
  })

// CHANGE: derive the process exit code from the finished report
// WHY: CI callers gate on malformed manifests and, when asked, on outdated dependencies
// REF: req-exit-code-1
// FORMAT THEOREM: malformed → 1; failOnOutdated ∧ outdated → 2; otherwise 0
// PURITY: CORE
// INVARIANT: unresolved rows alone never fail the run
// COMPLEXITY: O(1)
const exitCodeFor = (report: Report, failOnOutdated: boolean): number => {
  if (hasMalformed(report)) {
    return 1
  }
  return failOnOutdated && hasOutdated(report) ? 2 : 0
}

const handleCheck = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const configPath = cli.configPath ?? path.join(cli.dir, CONFIG_FILE_NAME)
    const fileConfig = yield* _(loadConfigFile(configPath, cli.configPath !== undefined))
    const config = resolveConfig(cli, fileConfig)
    const manifests = yield* _(readManifestSources(cli.dir))
    const transport = yield* _(RegistryTransport)
    const report = yield* _(
      runPipeline({
        manifests,
        indexes: makePackageIndexes(transport, config),
        settings: config
      })
    )
    yield* _(emitReport(report, cli))
    return { report, exitCode: exitCodeFor(report, config.failOnOutdated) }
  })

const handleRender = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const inputPath = cli.inputPath
    if (inputPath === undefined) {
      return yield* _(Effect.fail(cliError("render requires --input <report.json>")))
    }
    const report = yield* _(readReportFile(inputPath))
    yield* _(emitReport(report, cli))
    return { report, exitCode: 0 }
  })

const executeCommand = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => handleCheck(cli)),
    Match.when("render", () => handleRender(cli)),
    Match.exhaustive
  )

const minimumLogLevel = (cli: CliArgs): LogLevel.LogLevel =>
  cli.silent ? LogLevel.None : LogLevel.fromLiteral(cli.logLevel ?? "Info")

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with report and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, RegistryTransport, Console
 * @invariant exitCode is deterministic for fixed inputs and registry answers
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<
  ProgramResult,
  AppError,
  ProgramEnv
> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(executeCommand(cli).pipe(Logger.withMinimumLogLevel(minimumLogLevel(cli))))
  })
