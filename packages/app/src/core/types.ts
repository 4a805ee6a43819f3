// CHANGE: define core domain types for declared dependencies, versions, comparisons and reports
// WHY: keep IO-free data structures reusable across parsers, resolvers, renderers and tests
// REF: req-report-types-1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: status = UNRESOLVED ⇔ latest = undefined
// COMPLEXITY: O(1)/O(1)

export type Ecosystem = "npm" | "pip"

export const ecosystems: ReadonlyArray<Ecosystem> = ["npm", "pip"]

export const manifestFileNames: Readonly<Record<Ecosystem, string>> = {
  npm: "package.json",
  pip: "requirements.txt"
}

export interface DeclaredDependency {
  readonly name: string
  readonly ecosystem: Ecosystem
  /** Version expression exactly as written in the manifest. */
  readonly constraint: string
  /** Comparable version extracted from the constraint; undefined when unspecified. */
  readonly anchor: string | undefined
}

export interface Version {
  readonly raw: string
  readonly epoch: number
  readonly release: ReadonlyArray<number>
  readonly major: number
  readonly minor: number
  readonly patch: number
  readonly prerelease: ReadonlyArray<string | number>
  readonly post: number | undefined
  readonly dev: number | undefined
  readonly build: ReadonlyArray<string>
}

export interface ResolvedVersions {
  readonly name: string
  readonly ecosystem: Ecosystem
  /** Ascending, without duplicates under version equality. */
  readonly available: ReadonlyArray<Version>
}

export type Status = "UP_TO_DATE" | "OUTDATED" | "UNRESOLVED"

export type FailureReason =
  | "not-found"
  | "timeout"
  | "deadline"
  | "unreachable"
  | "malformed-response"

export type UnresolvedReason = FailureReason | "unspecified-version" | "unparseable-version"

export type ComparisonResult =
  | {
    readonly name: string
    readonly ecosystem: Ecosystem
    readonly declared: string
    readonly latest: Version
    readonly status: "UP_TO_DATE" | "OUTDATED"
  }
  | {
    readonly name: string
    readonly ecosystem: Ecosystem
    readonly declared: string
    readonly latest: undefined
    readonly status: "UNRESOLVED"
    readonly reason: UnresolvedReason
  }

export type EcosystemSection =
  | {
    readonly _tag: "Checked"
    readonly ecosystem: Ecosystem
    readonly manifest: string
    readonly results: ReadonlyArray<ComparisonResult>
  }
  | {
    readonly _tag: "Malformed"
    readonly ecosystem: Ecosystem
    readonly manifest: string
    readonly message: string
  }

export interface ReportSummary {
  readonly total: number
  readonly outdated: number
  readonly upToDate: number
  readonly unresolved: number
}

export type Report =
  | { readonly _tag: "NoManifests"; readonly message: string }
  | {
    readonly _tag: "Sections"
    readonly sections: ReadonlyArray<EcosystemSection>
    readonly summary: ReportSummary
  }
