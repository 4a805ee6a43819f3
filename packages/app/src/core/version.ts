import * as Option from "effect/Option"

import type { Ecosystem, Version } from "./types.js"

// CHANGE: parse semver and PEP 440 spellings into one structured Version and order them totally
// WHY: registry listings and manifests disagree on spelling (v1.2.3, 1.2.3.0, 1.0rc1) but must compare by meaning
// REF: req-version-1
// FORMAT THEOREM: ∀a,b: sign(compare(a,b)) = -sign(compare(b,a)) ∧ compare(a,a) = 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: missing release components compare as zero; build metadata never affects order
// COMPLEXITY: O(n) per comparison where n = number of components

const RELEASE_PATTERN = /^(?:(\d+)!)?(\d+(?:\.\d+)*)(.*)$/u
const PEP_SUFFIX_PATTERN =
  /^(?:[-_.]?(a|b|c|rc|alpha|beta|pre|preview)[-_.]?(\d*))?(?:-(\d+)|[-_.]?(post|rev|r)[-_.]?(\d*))?(?:[-_.]?(dev)[-_.]?(\d*))?$/iu
const SEMVER_IDENTIFIERS_PATTERN = /^[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*$/u
const BUILD_PATTERN = /^[0-9A-Za-z._-]+$/u
const NUMERIC_PATTERN = /^\d+$/u

interface Suffix {
  readonly prerelease: ReadonlyArray<string | number>
  readonly post: number | undefined
  readonly dev: number | undefined
}

const toSafeInteger = (digits: string): number | undefined => {
  const value = Number.parseInt(digits.length === 0 ? "0" : digits, 10)
  return Number.isSafeInteger(value) ? value : undefined
}

const normalizePreLabel = (label: string): string => {
  const lower = label.toLowerCase()
  if (lower === "alpha") {
    return "a"
  }
  if (lower === "beta") {
    return "b"
  }
  if (lower === "c" || lower === "pre" || lower === "preview") {
    return "rc"
  }
  return lower
}

const parseSemverPrerelease = (value: string): Suffix | undefined => {
  if (!SEMVER_IDENTIFIERS_PATTERN.test(value)) {
    return undefined
  }
  const identifiers: Array<string | number> = []
  for (const part of value.split(".")) {
    if (NUMERIC_PATTERN.test(part)) {
      const numeric = toSafeInteger(part)
      if (numeric === undefined) {
        return undefined
      }
      identifiers.push(numeric)
    } else {
      identifiers.push(part)
    }
  }
  return { prerelease: identifiers, post: undefined, dev: undefined }
}

const optionalNumber = (label: string | undefined, digits: string | undefined): number | undefined | null => {
  if (label === undefined) {
    return undefined
  }
  const value = toSafeInteger(digits ?? "")
  return value === undefined ? null : value
}

const parsePepSuffix = (value: string): Suffix | undefined => {
  const match = PEP_SUFFIX_PATTERN.exec(value)
  if (match === null) {
    return undefined
  }
  const [, preLabel, preNumber, implicitPost, postLabel, postNumber, devLabel, devNumber] = match
  const pre = optionalNumber(preLabel, preNumber)
  // `1.0-1` is the implicit spelling of `1.0.post1`
  const post = implicitPost === undefined ? optionalNumber(postLabel, postNumber) : optionalNumber("post", implicitPost)
  const dev = optionalNumber(devLabel, devNumber)
  if (pre === null || post === null || dev === null) {
    return undefined
  }
  return {
    prerelease: preLabel === undefined || pre === undefined ? [] : [normalizePreLabel(preLabel), pre],
    post,
    dev
  }
}

// npm reads every `-` suffix as a pre-release; pip reads `-rc1`, `-post1` and `-1` as PEP 440 first
const parseSuffix = (value: string, ecosystem: Ecosystem | undefined): Suffix | undefined => {
  if (!value.startsWith("-")) {
    return parsePepSuffix(value)
  }
  if (ecosystem === "pip") {
    return parsePepSuffix(value) ?? parseSemverPrerelease(value.slice(1))
  }
  return parseSemverPrerelease(value.slice(1))
}

const splitBuild = (value: string): { readonly head: string; readonly build: ReadonlyArray<string> } | undefined => {
  const plus = value.indexOf("+")
  if (plus === -1) {
    return { head: value, build: [] }
  }
  const build = value.slice(plus + 1)
  if (!BUILD_PATTERN.test(build)) {
    return undefined
  }
  return { head: value.slice(0, plus), build: build.split(".") }
}

const parseRelease = (value: string): ReadonlyArray<number> | undefined => {
  const result: Array<number> = []
  for (const part of value.split(".")) {
    const numeric = toSafeInteger(part)
    if (numeric === undefined) {
      return undefined
    }
    result.push(numeric)
  }
  return result
}

/**
 * Parse a version string into its structured form.
 *
 * @param text - Version as published or declared (`1.2.3`, `v1.2.3`, `1.0rc1`, `1!2.0.post1`).
 * @param ecosystem - Scheme used for a `-` suffix; semver unless "pip".
 * @returns Some(Version) or None when the text is not a recognizable version.
 *
 * @pure true
 * @invariant result.release.length ≥ 1
 * @complexity O(n)
 */
export const parseVersion = (text: string, ecosystem?: Ecosystem): Option.Option<Version> => {
  const raw = text.trim()
  const unprefixed = raw.replace(/^=?\s*[vV]?/u, "")
  const match = RELEASE_PATTERN.exec(unprefixed)
  if (match === null) {
    return Option.none()
  }
  const [, epochDigits, releaseText = "", rest = ""] = match
  const epoch = epochDigits === undefined ? 0 : toSafeInteger(epochDigits)
  const release = parseRelease(releaseText)
  const split = splitBuild(rest)
  if (epoch === undefined || release === undefined || split === undefined) {
    return Option.none()
  }
  const suffix = parseSuffix(split.head, ecosystem)
  if (suffix === undefined) {
    return Option.none()
  }
  return Option.some({
    raw,
    epoch,
    release,
    major: release[0] ?? 0,
    minor: release[1] ?? 0,
    patch: release[2] ?? 0,
    prerelease: suffix.prerelease,
    post: suffix.post,
    dev: suffix.dev,
    build: split.build
  })
}

const compareNumbers = (left: number, right: number): number => {
  if (left === right) {
    return 0
  }
  return left < right ? -1 : 1
}

const compareRelease = (left: ReadonlyArray<number>, right: ReadonlyArray<number>): number => {
  const length = Math.max(left.length, right.length)
  for (let index = 0; index < length; index += 1) {
    const result = compareNumbers(left[index] ?? 0, right[index] ?? 0)
    if (result !== 0) {
      return result
    }
  }
  return 0
}

const compareIdentifier = (left: string | number, right: string | number): number => {
  if (typeof left === "number" && typeof right === "number") {
    return compareNumbers(left, right)
  }
  if (typeof left === "number") {
    return -1
  }
  if (typeof right === "number") {
    return 1
  }
  if (left === right) {
    return 0
  }
  return left < right ? -1 : 1
}

const comparePrerelease = (
  left: ReadonlyArray<string | number>,
  right: ReadonlyArray<string | number>
): number => {
  const length = Math.min(left.length, right.length)
  for (let index = 0; index < length; index += 1) {
    const leftIdentifier = left[index]
    const rightIdentifier = right[index]
    if (leftIdentifier !== undefined && rightIdentifier !== undefined) {
      const result = compareIdentifier(leftIdentifier, rightIdentifier)
      if (result !== 0) {
        return result
      }
    }
  }
  return compareNumbers(left.length, right.length)
}

// dev-only < pre-release < final (including post-releases)
const phase = (version: Version): number => {
  if (version.prerelease.length > 0) {
    return 1
  }
  return version.dev !== undefined && version.post === undefined ? 0 : 2
}

/**
 * Total order over versions: epoch, release, phase, pre-release identifiers, post, dev.
 *
 * @returns negative when left < right, zero when equal, positive when left > right.
 *
 * @pure true
 * @invariant compare(1.0.0-beta, 1.0.0) < 0 and compare(1.2.3, 1.2.3.0) = 0
 * @complexity O(n)
 */
export const compareVersions = (left: Version, right: Version): number => {
  const byEpoch = compareNumbers(left.epoch, right.epoch)
  if (byEpoch !== 0) {
    return byEpoch
  }
  const byRelease = compareRelease(left.release, right.release)
  if (byRelease !== 0) {
    return byRelease
  }
  const byPhase = compareNumbers(phase(left), phase(right))
  if (byPhase !== 0) {
    return byPhase
  }
  const byPrerelease = comparePrerelease(left.prerelease, right.prerelease)
  if (byPrerelease !== 0) {
    return byPrerelease
  }
  const byPost = compareNumbers(left.post ?? -1, right.post ?? -1)
  if (byPost !== 0) {
    return byPost
  }
  return compareNumbers(left.dev ?? Number.POSITIVE_INFINITY, right.dev ?? Number.POSITIVE_INFINITY)
}

export const isStable = (version: Version): boolean => version.prerelease.length === 0 && version.dev === undefined

/**
 * Sort versions ascending and drop later duplicates under version equality.
 *
 * @pure true
 * @invariant ∀i: compare(out[i], out[i+1]) < 0
 * @complexity O(n log n)
 */
export const sortUniqueVersions = (versions: ReadonlyArray<Version>): ReadonlyArray<Version> => {
  const sorted = versions.toSorted(compareVersions)
  const result: Array<Version> = []
  for (const version of sorted) {
    const last = result.at(-1)
    if (last === undefined || compareVersions(last, version) !== 0) {
      result.push(version)
    }
  }
  return result
}

export const maxVersion = (versions: ReadonlyArray<Version>): Option.Option<Version> => {
  let best: Version | undefined
  for (const version of versions) {
    if (best === undefined || compareVersions(version, best) > 0) {
      best = version
    }
  }
  return Option.fromNullable(best)
}
