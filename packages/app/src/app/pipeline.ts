import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { CompareOptions, Resolution } from "../core/compare.js"
import { compareDependency, declaredBaseline, unresolved } from "../core/compare.js"
import type { ManifestMalformed } from "../core/errors.js"
import type { ManifestSource } from "../core/manifest.js"
import { parseManifest } from "../core/manifest.js"
import { buildReport } from "../core/report.js"
import type { ComparisonResult, DeclaredDependency, Ecosystem, EcosystemSection, Report } from "../core/types.js"
import type { PackageIndexes } from "../shell/registry.js"
import type { ResolveSettings } from "../shell/resolve.js"
import { resolveAll } from "../shell/resolve.js"

// CHANGE: run manifests through parse, resolve, compare and report
// WHY: give check one composition root with no ambient state
// REF: req-pipeline-1
// FORMAT THEOREM: ∀m,i: rows(run(m, i)) = declared(m) in manifest order
// PURITY: SHELL
// EFFECT: Effect<Report, never, never>
// INVARIANT: a malformed manifest or failed lookup never aborts the other sections
// COMPLEXITY: O(n) lookups with bounded concurrency

export type PipelineSettings = ResolveSettings & CompareOptions

export interface PipelineInput {
  readonly manifests: ReadonlyArray<ManifestSource>
  readonly indexes: PackageIndexes
  readonly settings: PipelineSettings
}

interface ParsedManifest {
  readonly ecosystem: Ecosystem
  readonly file: string
  readonly outcome: Either.Either<ReadonlyArray<DeclaredDependency>, ManifestMalformed>
}

const parsePresent = (manifests: ReadonlyArray<ManifestSource>): ReadonlyArray<ParsedManifest> =>
  manifests.flatMap((source) =>
    source._tag === "Present"
      ? [{ ecosystem: source.ecosystem, file: source.file, outcome: parseManifest(source.content, source.ecosystem) }]
      : []
  )

const classify = (
  dependency: DeclaredDependency,
  resolutions: ReadonlyMap<DeclaredDependency, Resolution>,
  settings: CompareOptions
): ComparisonResult => {
  const baseline = declaredBaseline(dependency)
  if (Either.isLeft(baseline)) {
    return unresolved(dependency, baseline.left)
  }
  const resolution = resolutions.get(dependency)
  return resolution === undefined
    ? unresolved(dependency, "malformed-response")
    : compareDependency(dependency, resolution, settings)
}

const toSection = (
  manifest: ParsedManifest,
  resolutions: ReadonlyMap<DeclaredDependency, Resolution>,
  settings: CompareOptions
): EcosystemSection =>
  Either.match(manifest.outcome, {
    onLeft: (error): EcosystemSection => ({
      _tag: "Malformed",
      ecosystem: manifest.ecosystem,
      manifest: manifest.file,
      message: error.message
    }),
    onRight: (dependencies): EcosystemSection => ({
      _tag: "Checked",
      ecosystem: manifest.ecosystem,
      manifest: manifest.file,
      results: dependencies.map((dependency) => classify(dependency, resolutions, settings))
    })
  })

/**
 * Produce the report for a set of manifest sources.
 *
 * @param input - Manifest sources, per-ecosystem package indexes and run settings.
 * @returns Report; registry failures are recorded as UNRESOLVED rows.
 *
 * @pure false
 * @effect registry lookups through the given indexes
 * @invariant dependencies without a usable version are never queried
 * @complexity O(n)
 */
export const runPipeline = (input: PipelineInput): Effect.Effect<Report> =>
  Effect.gen(function*(_) {
    const parsed = parsePresent(input.manifests)
    for (const manifest of parsed) {
      if (Either.isLeft(manifest.outcome)) {
        yield* _(
          Effect.logWarning(`skipping ${manifest.file}: ${manifest.outcome.left.message}`).pipe(
            Effect.annotateLogs({ ecosystem: manifest.ecosystem })
          )
        )
      }
    }
    const queryable = parsed
      .flatMap((manifest) => Either.isRight(manifest.outcome) ? manifest.outcome.right : [])
      .filter((dependency) => Either.isRight(declaredBaseline(dependency)))
    yield* _(Effect.logInfo(`checking ${queryable.length} dependencies`))
    const resolved = yield* _(resolveAll(input.indexes, queryable, input.settings))
    const resolutions = new Map<DeclaredDependency, Resolution>()
    queryable.forEach((dependency, index) => {
      const resolution = resolved[index]
      if (resolution !== undefined) {
        resolutions.set(dependency, resolution)
      }
    })
    return buildReport(parsed.map((manifest) => toSection(manifest, resolutions, input.settings)))
  })
