import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { ManifestSource } from "../core/manifest.js"
import type { Ecosystem } from "../core/types.js"
import { ecosystems, manifestFileNames } from "../core/types.js"

// CHANGE: read the recognized manifests of a project directory
// WHY: turn the ambient working directory into explicit manifest contents for the pipeline
// REF: req-manifest-io-1
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<ManifestSource>, AppError, FileSystem | Path>
// INVARIANT: one source per ecosystem, in ecosystem order; absence is data, not failure
// COMPLEXITY: O(n) in manifest size

const readManifest = (
  fs: FileSystemService,
  path: PathService,
  dir: string,
  ecosystem: Ecosystem
): Effect.Effect<ManifestSource, AppError> =>
  Effect.gen(function*(_) {
    const file = manifestFileNames[ecosystem]
    const location = path.join(dir, file)
    const exists = yield* _(fs.exists(location).pipe(Effect.mapError((error) => fileError(String(error)))))
    if (!exists) {
      return { _tag: "Absent", ecosystem, file } satisfies ManifestSource
    }
    const content = yield* _(
      fs.readFileString(location).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return { _tag: "Present", ecosystem, file, content } satisfies ManifestSource
  })

export const readManifestSources = (
  dir: string
): Effect.Effect<ReadonlyArray<ManifestSource>, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    return yield* _(Effect.forEach(ecosystems, (ecosystem) => readManifest(fs, path, dir, ecosystem)))
  })
