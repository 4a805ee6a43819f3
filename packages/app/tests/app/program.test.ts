import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { runCli } from "../../src/app/program.js"
import { renderJsonReport, renderMarkdownReport } from "../../src/core/report.js"
import type { TempContext } from "./test-helpers.js"
import { provideTestServices, tableTransport, withTempDir } from "./test-helpers.js"

const transport = tableTransport({
  "https://npm.example/react": { versions: { "17.0.2": {}, "18.2.0": {} } },
  "https://npm.example/lodash": { versions: { "4.17.21": {} } },
  "https://pypi.example/pypi/requests/json": { releases: { "2.25.0": [{}], "2.31.0": [{}] } }
})

const writeFixture = ({ fs, path, tempDir }: TempContext, files: Readonly<Record<string, string>>) =>
  Effect.forEach(Object.entries(files), ([name, content]) => fs.writeFileString(path.join(tempDir, name), content))

const registries = JSON.stringify({ npmRegistry: "https://npm.example", pypiRegistry: "https://pypi.example" })

const projectFiles = {
  ".dep-drift.json": registries,
  "package.json": JSON.stringify({ dependencies: { react: "^17.0.2", lodash: "^4.17.21" } }),
  "requirements.txt": "requests==2.25.0\nghost==1.0.0\n"
}

describe("runCli check", () => {
  it.effect("writes the JSON report and exits 0", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeFixture(context, projectFiles))
        const output = context.path.join(context.tempDir, "report.json")
        const result = yield* _(
          runCli(["node", "dep-drift", "check", "--dir", context.tempDir, "--json", "--output", output, "--silent"])
        )
        expect(result.exitCode).toBe(0)
        expect(result.report._tag === "Sections" ? result.report.summary : undefined).toEqual({
          total: 4,
          outdated: 2,
          upToDate: 1,
          unresolved: 1
        })
        const written = yield* _(context.fs.readFileString(output))
        expect(written).toBe(`${renderJsonReport(result.report)}\n`)
      })
    ).pipe(provideTestServices(transport)))

  it.effect("exits 2 with --fail-on-outdated when something is outdated", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeFixture(context, projectFiles))
        const result = yield* _(
          runCli(["node", "dep-drift", "--dir", context.tempDir, "--fail-on-outdated", "--silent"])
        )
        expect(result.exitCode).toBe(2)
      })
    ).pipe(provideTestServices(transport)))

  it.effect("exits 1 when a manifest is malformed", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeFixture(context, { ".dep-drift.json": registries, "package.json": "{ nope" }))
        const result = yield* _(runCli(["node", "dep-drift", "--dir", context.tempDir, "--silent"]))
        expect(result.exitCode).toBe(1)
      })
    ).pipe(provideTestServices(transport)))

  it.effect("reports missing manifests without failing", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const result = yield* _(runCli(["node", "dep-drift", "--dir", context.tempDir, "--silent"]))
        expect(result.exitCode).toBe(0)
        expect(result.report._tag).toBe("NoManifests")
      })
    ).pipe(provideTestServices(transport)))

  it.effect("fails when an explicit config file is missing", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const missing = context.path.join(context.tempDir, "absent.json")
        const result = yield* _(Effect.either(runCli(["node", "dep-drift", "--config", missing, "--silent"])))
        expect(result).toEqual(Either.left({ _tag: "FileError", message: `Config file not found: ${missing}` }))
      })
    ).pipe(provideTestServices(transport)))
})

describe("runCli render", () => {
  it.effect("re-renders a saved JSON report without registry access", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        yield* _(writeFixture(context, projectFiles))
        const output = context.path.join(context.tempDir, "report.json")
        const checked = yield* _(
          runCli(["node", "dep-drift", "--dir", context.tempDir, "--json", "--output", output, "--silent"])
        )
        const rendered = yield* _(runCli(["node", "dep-drift", "render", "--input", output, "--silent"]))
        expect(renderMarkdownReport(rendered.report)).toBe(renderMarkdownReport(checked.report))
        expect(rendered.exitCode).toBe(0)
      })
    ).pipe(provideTestServices(transport)))

  it.effect("requires --input", () =>
    Effect.gen(function*(_) {
      const result = yield* _(Effect.either(runCli(["node", "dep-drift", "render", "--silent"])))
      expect(result).toEqual(Either.left({ _tag: "CliError", message: "render requires --input <report.json>" }))
    }).pipe(provideTestServices(transport)))
})
