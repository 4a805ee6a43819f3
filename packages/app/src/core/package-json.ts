import * as Schema from "@effect/schema/Schema"
import * as Either from "effect/Either"

import type { ManifestMalformed } from "./errors.js"
import { manifestMalformed } from "./errors.js"
import type { Json, JsonObject } from "./json.js"
import { isJsonObject, JsonTextSchema } from "./json.js"
import type { DeclaredDependency } from "./types.js"

// CHANGE: read declared npm dependencies out of package.json text
// WHY: dependencies ∪ devDependencies form the npm half of the report
// REF: req-package-json-1
// FORMAT THEOREM: ∀k ∈ keys(dependencies) ∪ keys(devDependencies): |{d ∈ parse(raw) | d.name = k}| = 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: result order = first appearance across dependencies then devDependencies
// COMPLEXITY: O(n) where n = number of dependency entries

const dependencySections: ReadonlyArray<string> = ["dependencies", "devDependencies"]

const RANGE_PREFIX = /^[\s^~<>=]+/u
const ANCHOR_END = /\s|,|\|\|/u
const HAS_DIGIT = /\d/u
const BYTE_ORDER_MARK = /^\uFEFF/u

/**
 * Extract the comparable version anchor from an npm range expression.
 *
 * @param constraint - Range as written (`^17.0.2`, `>=1.2.3 <2`, `latest`).
 * @returns Anchor text, or undefined when nothing version-like remains.
 *
 * @pure true
 * @invariant returned anchor contains at least one digit
 * @complexity O(n)
 */
export const stripRangePrefix = (constraint: string): string | undefined => {
  const stripped = constraint.replace(RANGE_PREFIX, "")
  const end = stripped.search(ANCHOR_END)
  const anchor = end === -1 ? stripped : stripped.slice(0, end)
  return HAS_DIGIT.test(anchor) ? anchor : undefined
}

// entries whose value is not a string are skipped, the rest of the section still counts
const readSection = (value: Json | undefined): ReadonlyArray<readonly [string, string]> => {
  if (value === undefined || !isJsonObject(value)) {
    return []
  }
  const result: Array<readonly [string, string]> = []
  for (const [name, range] of Object.entries(value)) {
    if (typeof range === "string" && name.trim().length > 0) {
      result.push([name, range])
    }
  }
  return result
}

const collectDependencies = (pkg: JsonObject): ReadonlyArray<DeclaredDependency> => {
  const merged = new Map<string, string>()
  for (const section of dependencySections) {
    for (const [name, range] of readSection(pkg[section])) {
      merged.set(name, range)
    }
  }
  return [...merged.entries()].map(([name, constraint]): DeclaredDependency => ({
    name,
    ecosystem: "npm",
    constraint,
    anchor: stripRangePrefix(constraint)
  }))
}

/**
 * Parse package.json text into declared dependencies.
 *
 * @param raw - Full package.json contents.
 * @returns Declared dependencies, or ManifestMalformed when the text is not a JSON object.
 *
 * @pure true
 * @invariant names are unique
 * @complexity O(n)
 */
export const parsePackageJson = (
  raw: string
): Either.Either<ReadonlyArray<DeclaredDependency>, ManifestMalformed> => {
  const decoded = Schema.decodeUnknownEither(JsonTextSchema)(raw.replace(BYTE_ORDER_MARK, ""))
  if (Either.isLeft(decoded)) {
    return Either.left(manifestMalformed("npm", "package.json is not valid JSON"))
  }
  const parsed = decoded.right
  if (!isJsonObject(parsed)) {
    return Either.left(manifestMalformed("npm", "package.json must be an object"))
  }
  return Either.right(collectDependencies(parsed))
}
