import * as Clock from "effect/Clock"
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { Resolution } from "../core/compare.js"
import type { RegistryError } from "../core/errors.js"
import { deadlineExceeded, describeRegistryError, registryTimeout, unparseableListing } from "../core/errors.js"
import { toResolvedVersions } from "../core/registry.js"
import type { DeclaredDependency, ResolvedVersions } from "../core/types.js"
import type { PackageIndexes } from "./registry.js"

// CHANGE: resolve declared dependencies against their registries with bounded concurrency
// WHY: one slow or failing package must never block or fail the rest of the run
// REF: req-resolve-1
// FORMAT THEOREM: ∀ds: |resolveAll(ds)| = |ds| ∧ resolveAll(ds)[i] describes ds[i]
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<Resolution>, never, never>
// INVARIANT: at most `concurrency` lookups are in flight; failures are values
// COMPLEXITY: O(n / concurrency) round trips

export interface ResolveSettings {
  readonly concurrency: number
  readonly timeoutMs: number
  readonly deadlineMs: number | undefined
}

const remainingBudget = (
  settings: ResolveSettings,
  startedAt: number
): Effect.Effect<number | undefined> => {
  const deadline = settings.deadlineMs
  return deadline === undefined
    ? Effect.succeed(undefined)
    : Effect.map(Clock.currentTimeMillis, (now) => deadline - (now - startedAt))
}

const lookup = (
  indexes: PackageIndexes,
  dependency: DeclaredDependency,
  settings: ResolveSettings,
  startedAt: number
): Effect.Effect<ResolvedVersions, RegistryError> =>
  Effect.gen(function*(_) {
    const remaining = yield* _(remainingBudget(settings, startedAt))
    if (remaining !== undefined && remaining <= 0) {
      return yield* _(Effect.fail(deadlineExceeded(dependency.name)))
    }
    const deadlineBound = remaining !== undefined && remaining < settings.timeoutMs
    const budget = remaining === undefined ? settings.timeoutMs : Math.min(remaining, settings.timeoutMs)
    yield* _(Effect.logDebug("querying registry"))
    const published = yield* _(
      indexes[dependency.ecosystem].listVersions(dependency.name).pipe(
        Effect.timeoutFail({
          duration: Duration.millis(budget),
          onTimeout: (): RegistryError =>
            deadlineBound ? deadlineExceeded(dependency.name) : registryTimeout(dependency.name, settings.timeoutMs)
        })
      )
    )
    return yield* _(
      Either.match(toResolvedVersions(dependency.name, dependency.ecosystem, published), {
        onLeft: (message): Effect.Effect<ResolvedVersions, RegistryError> =>
          Effect.fail(unparseableListing(dependency.name, message)),
        onRight: (resolved): Effect.Effect<ResolvedVersions, RegistryError> => Effect.succeed(resolved)
      })
    )
  })

/**
 * Resolve one dependency, turning every failure into a Left.
 *
 * @pure false
 * @effect Clock, logging
 * @invariant never fails
 */
export const resolveDependency = (
  indexes: PackageIndexes,
  dependency: DeclaredDependency,
  settings: ResolveSettings,
  startedAt: number
): Effect.Effect<Resolution> =>
  Effect.either(lookup(indexes, dependency, settings, startedAt)).pipe(
    Effect.tap((resolution) =>
      Either.isLeft(resolution)
        ? Effect.logWarning(`lookup failed: ${describeRegistryError(resolution.left)}`)
        : Effect.logDebug(`resolved ${resolution.right.available.length} versions`)
    ),
    Effect.annotateLogs({ ecosystem: dependency.ecosystem, package: dependency.name })
  )

export const resolveAll = (
  indexes: PackageIndexes,
  dependencies: ReadonlyArray<DeclaredDependency>,
  settings: ResolveSettings
): Effect.Effect<ReadonlyArray<Resolution>> =>
  Effect.gen(function*(_) {
    const startedAt = yield* _(Clock.currentTimeMillis)
    return yield* _(
      Effect.forEach(
        dependencies,
        (dependency) => resolveDependency(indexes, dependency, settings, startedAt),
        { concurrency: settings.concurrency }
      )
    )
  })
