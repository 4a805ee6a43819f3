import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { loadConfigFile } from "../../src/shell/config-file.js"
import { readManifestSources } from "../../src/shell/manifest-file.js"
import { provideTestServices, tableTransport, withTempDir } from "../app/test-helpers.js"

const provide = provideTestServices(tableTransport({}))

describe("loadConfigFile", () => {
  it.effect("decodes the fields that are present", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, ".dep-drift.json")
        yield* _(fs.writeFileString(file, `{"concurrency": 3, "includePrerelease": false}`))
        const config = yield* _(loadConfigFile(file, false))
        expect(config).toEqual({ concurrency: 3, includePrerelease: false })
      })
    ).pipe(provide))

  it.effect("returns undefined for a missing implicit file", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const config = yield* _(loadConfigFile(path.join(tempDir, ".dep-drift.json"), false))
        expect(config).toBeUndefined()
      })
    ).pipe(provide))

  it.effect("rejects values of the wrong type", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, ".dep-drift.json")
        yield* _(fs.writeFileString(file, `{"concurrency": 0}`))
        const result = yield* _(Effect.either(loadConfigFile(file, false)))
        expect(Either.isLeft(result) ? result.left._tag : undefined).toBe("ConfigError")
      })
    ).pipe(provide))
})

describe("readManifestSources", () => {
  it.effect("returns one source per ecosystem in order", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(path.join(tempDir, "requirements.txt"), "flask==3.0.0\n"))
        const sources = yield* _(readManifestSources(tempDir))
        expect(sources).toEqual([
          { _tag: "Absent", ecosystem: "npm", file: "package.json" },
          { _tag: "Present", ecosystem: "pip", file: "requirements.txt", content: "flask==3.0.0\n" }
        ])
      })
    ).pipe(provide))
})
