import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"

import type { RegistryError } from "../../src/core/errors.js"
import { packageNotFound } from "../../src/core/errors.js"
import { RegistryTransport } from "../../src/shell/registry.js"

export interface TempContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
}

export const withTempDir = <A, E, R>(
  use: (context: TempContext) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, R | FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const tempDir = yield* _(fs.makeTempDirectory())
    return yield* _(use({ fs, path, tempDir }))
  })

// URLs missing from the table answer 404
export const tableTransport = (bodies: Readonly<Record<string, unknown>>): RegistryTransport =>
  RegistryTransport.of({
    getJson: (url): Effect.Effect<unknown, RegistryError> =>
      url in bodies ? Effect.succeed(bodies[url]) : Effect.fail(packageNotFound(url))
  })

export const provideTestServices = (transport: RegistryTransport) =>
<A, E>(effect: Effect.Effect<A, E, FileSystemService | PathService | RegistryTransport>) =>
  effect.pipe(
    Effect.provideService(RegistryTransport, transport),
    Effect.provide(NodeContext.layer)
  )
