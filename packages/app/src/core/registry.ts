import type { ParseError } from "@effect/schema/ParseResult"
import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Ecosystem, ResolvedVersions, Version } from "./types.js"
import { parseVersion, sortUniqueVersions } from "./version.js"

// CHANGE: decode npm and PyPI registry payloads into version listings
// WHY: transport stays in the shell while payload shape checks stay pure and testable
// REF: req-registry-1
// FORMAT THEOREM: ∀body: versions(body) = Right(vs) → vs ⊆ keys(body.versions | body.releases)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unparseable version strings are dropped, never fatal on their own
// COMPLEXITY: O(n log n) where n = number of published versions

export const NPM_ACCEPT = "application/vnd.npm.install-v1+json"

const NpmPackumentSchema = Schema.Struct({
  versions: Schema.Record({ key: Schema.String, value: Schema.Unknown })
})

const PypiFileSchema = Schema.Struct({
  yanked: Schema.optional(Schema.Boolean)
})

const PypiProjectSchema = Schema.Struct({
  releases: Schema.Record({ key: Schema.String, value: Schema.Array(PypiFileSchema) })
})

type PypiFile = Schema.Schema.Type<typeof PypiFileSchema>

const formatDecodeError = <A>(decoded: Either.Either<A, ParseError>): Either.Either<A, string> =>
  Either.mapLeft(decoded, (error) => TreeFormatter.formatErrorSync(error))

/**
 * List version strings from an npm packument (full or abbreviated).
 *
 * @pure true
 * @complexity O(n)
 */
export const npmVersionsFromBody = (body: unknown): Either.Either<ReadonlyArray<string>, string> =>
  Either.map(
    formatDecodeError(Schema.decodeUnknownEither(NpmPackumentSchema)(body)),
    (packument) => Object.keys(packument.versions)
  )

const isYanked = (files: ReadonlyArray<PypiFile>): boolean =>
  files.length > 0 && files.every((file) => file.yanked === true)

/**
 * List non-yanked release strings from a PyPI JSON API project document.
 *
 * @pure true
 * @invariant a release is dropped only when all of its files are yanked
 * @complexity O(n)
 */
export const pypiVersionsFromBody = (body: unknown): Either.Either<ReadonlyArray<string>, string> =>
  Either.map(
    formatDecodeError(Schema.decodeUnknownEither(PypiProjectSchema)(body)),
    (project) =>
      Object.entries(project.releases)
        .filter(([, files]) => !isYanked(files))
        .map(([version]) => version)
  )

const trimTrailingSlash = (value: string): string => value.endsWith("/") ? value.slice(0, -1) : value

export const npmPackageUrl = (registry: string, name: string): string =>
  `${trimTrailingSlash(registry)}/${name.startsWith("@") ? name.replace("/", "%2F") : encodeURIComponent(name)}`

export const pypiPackageUrl = (registry: string, name: string): string =>
  `${trimTrailingSlash(registry)}/pypi/${encodeURIComponent(name)}/json`

/**
 * Build ResolvedVersions from raw registry strings.
 *
 * @param name - Package name.
 * @param ecosystem - Ecosystem the listing came from.
 * @param published - Raw version strings as returned by the registry.
 * @returns ResolvedVersions, or Left when no entry parses as a version.
 *
 * @pure true
 * @invariant available is ascending and non-empty
 * @complexity O(n log n)
 */
export const toResolvedVersions = (
  name: string,
  ecosystem: Ecosystem,
  published: ReadonlyArray<string>
): Either.Either<ResolvedVersions, string> => {
  const parsed: Array<Version> = []
  for (const entry of published) {
    const version = parseVersion(entry, ecosystem)
    if (Option.isSome(version)) {
      parsed.push(version.value)
    }
  }
  if (parsed.length === 0) {
    return Either.left(`no parseable versions among ${published.length} published`)
  }
  return Either.right({ name, ecosystem, available: sortUniqueVersions(parsed) })
}
