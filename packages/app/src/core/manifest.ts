import * as Either from "effect/Either"
import { Match } from "effect"

import type { ManifestMalformed } from "./errors.js"
import { parsePackageJson } from "./package-json.js"
import { parseRequirements } from "./requirements.js"
import type { DeclaredDependency, Ecosystem } from "./types.js"

// CHANGE: dispatch manifest text to the parser of its ecosystem
// WHY: the pipeline treats every ecosystem through one parse(raw, ecosystem) contract
// REF: req-manifest-1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: absent manifests never reach the parser
// COMPLEXITY: O(n)

export type ManifestSource =
  | { readonly _tag: "Absent"; readonly ecosystem: Ecosystem; readonly file: string }
  | { readonly _tag: "Present"; readonly ecosystem: Ecosystem; readonly file: string; readonly content: string }

export const parseManifest = (
  raw: string,
  ecosystem: Ecosystem
): Either.Either<ReadonlyArray<DeclaredDependency>, ManifestMalformed> =>
  Match.value(ecosystem).pipe(
    Match.when("npm", () => parsePackageJson(raw)),
    Match.when("pip", () => Either.right(parseRequirements(raw))),
    Match.exhaustive
  )
