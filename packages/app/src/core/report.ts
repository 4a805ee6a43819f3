import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type {
  ComparisonResult,
  Ecosystem,
  EcosystemSection,
  Report,
  ReportSummary,
  Status,
  UnresolvedReason
} from "./types.js"
import { ecosystems } from "./types.js"
import { parseVersion } from "./version.js"

// CHANGE: build structured reports and render markdown and JSON payloads
// WHY: keep reporting pure and deterministic; the posting collaborator only receives text
// REF: req-report-1
// FORMAT THEOREM: ∀r: render(r) = render(r) ∧ render(decode(renderJson(r))) = render(r)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rows keep manifest order; sections keep ecosystem order npm, pip
// COMPLEXITY: O(n)

export const REPORT_TITLE = "## Dependency Update Report"

export const NO_MANIFESTS_MESSAGE = "No recognized dependency files (package.json, requirements.txt) were found."

const ecosystemRank = (ecosystem: Ecosystem): number => ecosystems.indexOf(ecosystem)

const summarize = (sections: ReadonlyArray<EcosystemSection>): ReportSummary => {
  let outdated = 0
  let upToDate = 0
  let unresolved = 0
  for (const section of sections) {
    if (section._tag === "Checked") {
      for (const result of section.results) {
        if (result.status === "OUTDATED") {
          outdated += 1
        } else if (result.status === "UP_TO_DATE") {
          upToDate += 1
        } else {
          unresolved += 1
        }
      }
    }
  }
  return { total: outdated + upToDate + unresolved, outdated, upToDate, unresolved }
}

/**
 * Build a Report from the sections of every ecosystem whose manifest was present.
 *
 * @param sections - One section per present manifest, in any order.
 * @returns The NoManifests sentinel when sections is empty, else ordered sections with a summary.
 *
 * @pure true
 * @invariant section order follows the ecosystem order
 * @complexity O(n)
 */
export const buildReport = (sections: ReadonlyArray<EcosystemSection>): Report => {
  if (sections.length === 0) {
    return { _tag: "NoManifests", message: NO_MANIFESTS_MESSAGE }
  }
  const ordered = sections.toSorted((left, right) => ecosystemRank(left.ecosystem) - ecosystemRank(right.ecosystem))
  return { _tag: "Sections", sections: ordered, summary: summarize(ordered) }
}

export const hasOutdated = (report: Report): boolean => report._tag === "Sections" && report.summary.outdated > 0

export const hasMalformed = (report: Report): boolean =>
  report._tag === "Sections" && report.sections.some((section) => section._tag === "Malformed")

const describeReason = (reason: UnresolvedReason): string =>
  Match.value(reason).pipe(
    Match.when("not-found", () => "not found"),
    Match.when("timeout", () => "timed out"),
    Match.when("deadline", () => "deadline exceeded"),
    Match.when("unreachable", () => "registry unreachable"),
    Match.when("malformed-response", () => "unexpected registry response"),
    Match.when("unspecified-version", () => "no version specified"),
    Match.when("unparseable-version", () => "unrecognized version"),
    Match.exhaustive
  )

const statusLabels: Readonly<Record<Status, string>> = {
  OUTDATED: "⚠️ Outdated",
  UP_TO_DATE: "✅ Up to date",
  UNRESOLVED: "❔ Unresolved"
}

export const statusLabel = (result: ComparisonResult): string =>
  result.status === "UNRESOLVED"
    ? `${statusLabels.UNRESOLVED} (${describeReason(result.reason)})`
    : statusLabels[result.status]

const escapeCell = (value: string): string => value.replaceAll("|", String.raw`\|`).replaceAll(/\r?\n/gu, " ")

const formatRow = (result: ComparisonResult): string => {
  const cells = [
    result.name,
    result.declared.length > 0 ? result.declared : "Not specified",
    result.latest === undefined ? "Unknown" : result.latest.raw,
    statusLabel(result)
  ]
  return `| ${cells.map(escapeCell).join(" | ")} |`
}

const formatSection = (section: EcosystemSection): ReadonlyArray<string> => {
  const heading = `### ${section.ecosystem} (${section.manifest})`
  if (section._tag === "Malformed") {
    return [heading, "", `> ❌ Could not read dependencies: ${escapeCell(section.message)}`]
  }
  if (section.results.length === 0) {
    return [heading, "", "_No dependencies declared._"]
  }
  return [
    heading,
    "",
    "| Package | Current Version | Latest Version | Status |",
    "| --- | --- | --- | --- |",
    ...section.results.map(formatRow)
  ]
}

const formatSummary = (summary: ReportSummary): string =>
  `**Summary:** ${summary.outdated} outdated, ${summary.upToDate} up to date, ` +
  `${summary.unresolved} unresolved (${summary.total} total)`

/**
 * Render the markdown payload handed to the comment/issue poster.
 *
 * @param report - Report data.
 * @returns Multi-line markdown without a trailing newline.
 *
 * @pure true
 * @invariant byte-identical output for equal reports
 * @complexity O(n)
 */
export const renderMarkdownReport = (report: Report): string => {
  if (report._tag === "NoManifests") {
    return [REPORT_TITLE, "", report.message].join("\n")
  }
  const blocks = report.sections.map((section) => formatSection(section).join("\n"))
  return [REPORT_TITLE, ...blocks, formatSummary(report.summary)].join("\n\n")
}

const reasons = [
  "not-found",
  "timeout",
  "deadline",
  "unreachable",
  "malformed-response",
  "unspecified-version",
  "unparseable-version"
] as const

const EcosystemSchema = Schema.Literal("npm", "pip")

const ResultJsonSchema = Schema.Struct({
  name: Schema.String,
  ecosystem: EcosystemSchema,
  declared: Schema.String,
  latest: Schema.NullOr(Schema.String),
  status: Schema.Literal("UP_TO_DATE", "OUTDATED", "UNRESOLVED"),
  reason: Schema.optional(Schema.Literal(...reasons))
})

const SectionJsonSchema = Schema.Union(
  Schema.Struct({
    _tag: Schema.Literal("Checked"),
    ecosystem: EcosystemSchema,
    manifest: Schema.String,
    results: Schema.Array(ResultJsonSchema)
  }),
  Schema.Struct({
    _tag: Schema.Literal("Malformed"),
    ecosystem: EcosystemSchema,
    manifest: Schema.String,
    message: Schema.String
  })
)

const ReportJsonSchema = Schema.Union(
  Schema.Struct({ _tag: Schema.Literal("NoManifests"), message: Schema.String }),
  Schema.Struct({
    _tag: Schema.Literal("Sections"),
    sections: Schema.Array(SectionJsonSchema),
    summary: Schema.Struct({
      total: Schema.Number,
      outdated: Schema.Number,
      upToDate: Schema.Number,
      unresolved: Schema.Number
    })
  })
)

type ResultJson = Schema.Schema.Type<typeof ResultJsonSchema>
type SectionJson = Schema.Schema.Type<typeof SectionJsonSchema>

const encodeResult = (result: ComparisonResult): ResultJson =>
  result.status === "UNRESOLVED"
    ? { ...result, latest: null }
    : { ...result, latest: result.latest.raw }

const encodeSection = (section: EcosystemSection): SectionJson =>
  section._tag === "Malformed" ? section : { ...section, results: section.results.map(encodeResult) }

/**
 * Render report as JSON text.
 *
 * @param report - Report data.
 * @returns Pretty-printed JSON that decodeReportJson reads back.
 *
 * @pure true
 * @invariant versions are stored as published text
 * @complexity O(n)
 */
export const renderJsonReport = (report: Report): string =>
  JSON.stringify(
    report._tag === "NoManifests"
      ? report
      : { ...report, sections: report.sections.map(encodeSection) },
    null,
    2
  )

const decodeResult = (json: ResultJson): Either.Either<ComparisonResult, string> => {
  const { declared, ecosystem, name } = json
  if (json.status === "UNRESOLVED") {
    if (json.reason === undefined || json.latest !== null) {
      return Either.left(`${name}: unresolved rows need a reason and no latest version`)
    }
    return Either.right({ name, ecosystem, declared, latest: undefined, status: "UNRESOLVED", reason: json.reason })
  }
  const latest = json.latest === null ? Option.none() : parseVersion(json.latest, ecosystem)
  if (Option.isNone(latest)) {
    return Either.left(`${name}: resolved rows need a valid latest version`)
  }
  return Either.right({ name, ecosystem, declared, latest: latest.value, status: json.status })
}

const decodeSection = (json: SectionJson): Either.Either<EcosystemSection, string> => {
  if (json._tag === "Malformed") {
    return Either.right(json)
  }
  const results: Array<ComparisonResult> = []
  for (const entry of json.results) {
    const decoded = decodeResult(entry)
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    results.push(decoded.right)
  }
  return Either.right({ _tag: "Checked", ecosystem: json.ecosystem, manifest: json.manifest, results })
}

/**
 * Decode a report previously written by renderJsonReport.
 *
 * @param raw - JSON text.
 * @returns Report or a human-readable decode error.
 *
 * @pure true
 * @invariant the summary is recomputed from the decoded rows
 * @complexity O(n)
 */
export const decodeReportJson = (raw: string): Either.Either<Report, string> => {
  const decoded = Schema.decodeUnknownEither(Schema.parseJson(ReportJsonSchema))(raw)
  if (Either.isLeft(decoded)) {
    return Either.left(TreeFormatter.formatErrorSync(decoded.left))
  }
  const json = decoded.right
  if (json._tag === "NoManifests") {
    return Either.right(json)
  }
  const sections: Array<EcosystemSection> = []
  for (const entry of json.sections) {
    const section = decodeSection(entry)
    if (Either.isLeft(section)) {
      return Either.left(section.left)
    }
    sections.push(section.right)
  }
  return Either.right(buildReport(sections))
}
