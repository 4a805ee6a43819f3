import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { RegistryError } from "./errors.js"
import { failureReason } from "./errors.js"
import type { ComparisonResult, DeclaredDependency, ResolvedVersions, UnresolvedReason, Version } from "./types.js"
import { compareVersions, isStable, maxVersion, parseVersion } from "./version.js"

// CHANGE: classify each declared dependency against its resolved registry versions
// WHY: the report needs a three-way verdict that never conflates a failed lookup with "up to date"
// REF: req-compare-1
// FORMAT THEOREM: status = OUTDATED ⇔ latest ≠ ∅ ∧ latest > anchor; UP_TO_DATE ⇔ latest ≠ ∅ ∧ latest ≤ anchor
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a missing or unparseable anchor wins over a successful resolution
// COMPLEXITY: O(n) where n = number of available versions

export type Resolution = Either.Either<ResolvedVersions, RegistryError>

export type BaselineProblem = Extract<UnresolvedReason, "unspecified-version" | "unparseable-version">

export interface CompareOptions {
  readonly includePrerelease: boolean
}

export const defaultCompareOptions: CompareOptions = { includePrerelease: true }

export const declaredBaseline = (declared: DeclaredDependency): Either.Either<Version, BaselineProblem> => {
  if (declared.anchor === undefined) {
    return Either.left<BaselineProblem>("unspecified-version")
  }
  return Option.match(parseVersion(declared.anchor, declared.ecosystem), {
    onNone: () => Either.left<BaselineProblem>("unparseable-version"),
    onSome: (version) => Either.right(version)
  })
}

/**
 * Pick the latest version from a resolved listing.
 *
 * @pure true
 * @invariant with includePrerelease = false a pre-release wins only when nothing stable exists
 * @complexity O(n)
 */
export const latestVersion = (
  resolved: ResolvedVersions,
  options: CompareOptions = defaultCompareOptions
): Option.Option<Version> => {
  if (options.includePrerelease) {
    return maxVersion(resolved.available)
  }
  const stable = resolved.available.filter(isStable)
  return maxVersion(stable.length > 0 ? stable : resolved.available)
}

export const unresolved = (declared: DeclaredDependency, reason: UnresolvedReason): ComparisonResult => ({
  name: declared.name,
  ecosystem: declared.ecosystem,
  declared: declared.anchor ?? "",
  latest: undefined,
  status: "UNRESOLVED",
  reason
})

/**
 * Compare a declared dependency with what its registry publishes.
 *
 * @param declared - Parsed manifest entry.
 * @param resolution - Registry listing or the failure that replaced it.
 * @returns ComparisonResult with status and latest version.
 *
 * @pure true
 * @invariant result.status = UNRESOLVED ⇔ result.latest = undefined
 * @complexity O(n)
 */
export const compareDependency = (
  declared: DeclaredDependency,
  resolution: Resolution,
  options: CompareOptions = defaultCompareOptions
): ComparisonResult => {
  const baseline = declaredBaseline(declared)
  if (Either.isLeft(baseline)) {
    return unresolved(declared, baseline.left)
  }
  if (Either.isLeft(resolution)) {
    return unresolved(declared, failureReason(resolution.left))
  }
  const latest = latestVersion(resolution.right, options)
  if (Option.isNone(latest)) {
    return unresolved(declared, "malformed-response")
  }
  return {
    name: declared.name,
    ecosystem: declared.ecosystem,
    declared: declared.anchor ?? "",
    latest: latest.value,
    status: compareVersions(latest.value, baseline.right) > 0 ? "OUTDATED" : "UP_TO_DATE"
  }
}
