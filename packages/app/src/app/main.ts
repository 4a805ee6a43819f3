#!/usr/bin/env node
import { NodeContext, NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer, Logger } from "effect"

import { formatAppError } from "../core/errors.js"
import { HttpTransportLive } from "../shell/registry.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services, a real HTTP client and stderr logging
// REF: req-main-1
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext | HttpClient>
// INVARIANT: logs never share stdout with the report
// COMPLEXITY: O(1)

const main = Effect.gen(function*(_) {
  const exitCode = yield* _(
    runCli(process.argv).pipe(
      Effect.map((result) => result.exitCode),
      Effect.catchAll((error) =>
        Effect.sync(() => {
          process.stderr.write(`${formatAppError(error)}\n`)
          return 1
        })
      )
    )
  )
  if (exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = exitCode
      })
    )
  }
})

const MainLive = Layer.mergeAll(
  NodeContext.layer,
  HttpTransportLive.pipe(Layer.provide(NodeHttpClient.layer)),
  Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.logfmtLogger))
)

NodeRuntime.runMain(Effect.provide(main, MainLive))
