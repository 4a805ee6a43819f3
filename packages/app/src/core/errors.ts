import { Match } from "effect"

import type { CliError } from "./cli.js"
import type { Ecosystem, FailureReason } from "./types.js"

// CHANGE: unify error algebra for manifests, registry lookups and the CLI program
// WHY: provide typed failures for program flow, per-dependency recovery and exit codes
// REF: req-errors-1
// FORMAT THEOREM: ∀e ∈ AppError ∪ RegistryError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ReportDecodeError = { readonly _tag: "ReportDecodeError"; readonly file: string; readonly message: string }
export type ManifestMalformed = {
  readonly _tag: "ManifestMalformed"
  readonly ecosystem: Ecosystem
  readonly message: string
}

export type PackageNotFound = { readonly _tag: "PackageNotFound"; readonly url: string }
export type RegistryTimeout = { readonly _tag: "RegistryTimeout"; readonly name: string; readonly millis: number }
export type DeadlineExceeded = { readonly _tag: "DeadlineExceeded"; readonly name: string }
export type RegistryUnreachable = { readonly _tag: "RegistryUnreachable"; readonly url: string; readonly message: string }
export type MalformedResponse = { readonly _tag: "MalformedResponse"; readonly url: string; readonly message: string }
export type UnparseableListing = { readonly _tag: "UnparseableListing"; readonly name: string; readonly message: string }

export type RegistryError =
  | PackageNotFound
  | RegistryTimeout
  | DeadlineExceeded
  | RegistryUnreachable
  | MalformedResponse
  | UnparseableListing

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ReportDecodeError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const reportDecodeError = (file: string, message: string): ReportDecodeError => ({
  _tag: "ReportDecodeError",
  file,
  message
})

export const manifestMalformed = (ecosystem: Ecosystem, message: string): ManifestMalformed => ({
  _tag: "ManifestMalformed",
  ecosystem,
  message
})

export const packageNotFound = (url: string): PackageNotFound => ({
  _tag: "PackageNotFound",
  url
})

export const registryTimeout = (name: string, millis: number): RegistryTimeout => ({
  _tag: "RegistryTimeout",
  name,
  millis
})

export const deadlineExceeded = (name: string): DeadlineExceeded => ({
  _tag: "DeadlineExceeded",
  name
})

export const registryUnreachable = (url: string, message: string): RegistryUnreachable => ({
  _tag: "RegistryUnreachable",
  url,
  message
})

export const malformedResponse = (url: string, message: string): MalformedResponse => ({
  _tag: "MalformedResponse",
  url,
  message
})

export const unparseableListing = (name: string, message: string): UnparseableListing => ({
  _tag: "UnparseableListing",
  name,
  message
})

/**
 * Map a registry failure onto the reason recorded in the report.
 *
 * @pure true
 * @invariant total over RegistryError
 */
export const failureReason = (error: RegistryError): FailureReason =>
  Match.value(error).pipe(
    Match.tag("PackageNotFound", (): FailureReason => "not-found"),
    Match.tag("RegistryTimeout", (): FailureReason => "timeout"),
    Match.tag("DeadlineExceeded", (): FailureReason => "deadline"),
    Match.tag("RegistryUnreachable", (): FailureReason => "unreachable"),
    Match.tag("MalformedResponse", (): FailureReason => "malformed-response"),
    Match.tag("UnparseableListing", (): FailureReason => "malformed-response"),
    Match.exhaustive
  )

export const describeRegistryError = (error: RegistryError): string =>
  Match.value(error).pipe(
    Match.tag("PackageNotFound", (value) => `package not found at ${value.url}`),
    Match.tag("RegistryTimeout", (value) => `${value.name} did not resolve within ${value.millis}ms`),
    Match.tag("DeadlineExceeded", (value) => `run deadline reached before ${value.name} resolved`),
    Match.tag("RegistryUnreachable", (value) => `${value.url} unreachable: ${value.message}`),
    Match.tag("MalformedResponse", (value) => `unexpected response from ${value.url}: ${value.message}`),
    Match.tag("UnparseableListing", (value) => `${value.name} lists no usable version: ${value.message}`),
    Match.exhaustive
  )

export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("ConfigError", (value) => `Invalid config: ${value.message}`),
    Match.tag("FileError", (value) => value.message),
    Match.tag("ReportDecodeError", (value) => `Cannot read report ${value.file}: ${value.message}`),
    Match.exhaustive
  )
