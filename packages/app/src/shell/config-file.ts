import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .dep-drift.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// REF: req-config-file-1
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing implicit config yields undefined; missing explicit config fails
// COMPLEXITY: O(n)

const PositiveInt = S.Number.pipe(S.int(), S.positive())

const RawConfigSchema = S.partial(
  S.Struct({
    concurrency: PositiveInt,
    timeoutMs: PositiveInt,
    deadlineMs: PositiveInt,
    includePrerelease: S.Boolean,
    npmRegistry: S.String,
    pypiRegistry: S.String,
    failOnOutdated: S.Boolean
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.concurrency === undefined ? {} : { concurrency: config.concurrency }),
      ...(config.timeoutMs === undefined ? {} : { timeoutMs: config.timeoutMs }),
      ...(config.deadlineMs === undefined ? {} : { deadlineMs: config.deadlineMs }),
      ...(config.includePrerelease === undefined ? {} : { includePrerelease: config.includePrerelease }),
      ...(config.npmRegistry === undefined ? {} : { npmRegistry: config.npmRegistry }),
      ...(config.pypiRegistry === undefined ? {} : { pypiRegistry: config.pypiRegistry }),
      ...(config.failOnOutdated === undefined ? {} : { failOnOutdated: config.failOnOutdated })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(decodeConfig(contents))
  })
