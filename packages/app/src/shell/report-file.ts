import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { AppError } from "../core/errors.js"
import { fileError, reportDecodeError } from "../core/errors.js"
import { decodeReportJson } from "../core/report.js"
import type { Report } from "../core/types.js"

// CHANGE: persist rendered reports and load previously saved JSON reports
// WHY: `render` re-renders a saved report without touching any registry
// REF: req-report-io-1
// PURITY: SHELL
// EFFECT: Effect<Report | void, AppError, FileSystem>
// INVARIANT: written payloads always end with a single newline
// COMPLEXITY: O(n)

export const readReportFile = (path: string): Effect.Effect<Report, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error)))))
    if (!exists) {
      return yield* _(Effect.fail(fileError(`Report file not found: ${path}`)))
    }
    const raw = yield* _(fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error)))))
    return yield* _(
      Either.match(decodeReportJson(raw), {
        onLeft: (message): Effect.Effect<Report, AppError> => Effect.fail(reportDecodeError(path, message)),
        onRight: (report): Effect.Effect<Report, AppError> => Effect.succeed(report)
      })
    )
  })

export const writeReportFile = (
  path: string,
  payload: string
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, payload.endsWith("\n") ? payload : `${payload}\n`).pipe(
        Effect.mapError((error) => fileError(String(error)))
      )
    )
  })
