import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { compareDependency, latestVersion } from "../../src/core/compare.js"
import { packageNotFound, registryTimeout } from "../../src/core/errors.js"
import type { DeclaredDependency, ResolvedVersions } from "../../src/core/types.js"
import { parseVersion } from "../../src/core/version.js"

const declared = (name: string, anchor: string | undefined): DeclaredDependency => ({
  name,
  ecosystem: "npm",
  constraint: anchor === undefined ? "" : `^${anchor}`,
  anchor
})

const listing = (name: string, versions: ReadonlyArray<string>): ResolvedVersions => ({
  name,
  ecosystem: "npm",
  available: versions.flatMap((text) => Option.toArray(parseVersion(text)))
})

describe("latestVersion", () => {
  it.effect("returns the highest version including pre-releases by default", () =>
    Effect.sync(() => {
      const latest = latestVersion(listing("a", ["1.0.0", "2.0.0-beta.1"]))
      expect(Option.map(latest, (version) => version.raw)).toEqual(Option.some("2.0.0-beta.1"))
    }))

  it.effect("prefers stable versions when pre-releases are excluded", () =>
    Effect.sync(() => {
      const latest = latestVersion(listing("a", ["1.0.0", "2.0.0-beta.1"]), { includePrerelease: false })
      expect(Option.map(latest, (version) => version.raw)).toEqual(Option.some("1.0.0"))
    }))

  it.effect("falls back to pre-releases when nothing stable exists", () =>
    Effect.sync(() => {
      const latest = latestVersion(listing("a", ["0.1.0-alpha", "0.1.0-beta"]), { includePrerelease: false })
      expect(Option.map(latest, (version) => version.raw)).toEqual(Option.some("0.1.0-beta"))
    }))
})

describe("compareDependency", () => {
  it.effect("marks a newer registry version as outdated", () =>
    Effect.sync(() => {
      const result = compareDependency(declared("react", "17.0.2"), Either.right(listing("react", ["17.0.2", "18.2.0"])))
      expect(result.status).toBe("OUTDATED")
      expect(result.latest?.raw).toBe("18.2.0")
      expect(result.declared).toBe("17.0.2")
    }))

  it.effect("marks the newest declared version as up to date", () =>
    Effect.sync(() => {
      const result = compareDependency(declared("lodash", "4.17.21"), Either.right(listing("lodash", ["4.17.20", "4.17.21"])))
      expect(result.status).toBe("UP_TO_DATE")
    }))

  it.effect("treats a declared version ahead of the registry as up to date", () =>
    Effect.sync(() => {
      const result = compareDependency(declared("x", "3.0.0"), Either.right(listing("x", ["2.9.0"])))
      expect(result.status).toBe("UP_TO_DATE")
      expect(result.latest?.raw).toBe("2.9.0")
    }))

  it.effect("records the failure reason when the lookup failed", () =>
    Effect.sync(() => {
      const notFound = compareDependency(declared("ghost", "1.0.0"), Either.left(packageNotFound("https://registry.example/ghost")))
      expect(notFound).toEqual({
        name: "ghost",
        ecosystem: "npm",
        declared: "1.0.0",
        latest: undefined,
        status: "UNRESOLVED",
        reason: "not-found"
      })
      const slow = compareDependency(declared("slow", "1.0.0"), Either.left(registryTimeout("slow", 50)))
      expect(slow.status === "UNRESOLVED" ? slow.reason : undefined).toBe("timeout")
    }))

  it.effect("never reports a dependency without a version as up to date", () =>
    Effect.sync(() => {
      const result = compareDependency(declared("bare", undefined), Either.right(listing("bare", ["1.0.0"])))
      expect(result.status).toBe("UNRESOLVED")
      expect(result.status === "UNRESOLVED" ? result.reason : undefined).toBe("unspecified-version")
      expect(result.declared).toBe("")
    }))

  it.effect("flags an anchor that is not a version", () =>
    Effect.sync(() => {
      const result = compareDependency(declared("odd", "workspace-1"), Either.right(listing("odd", ["1.0.0"])))
      expect(result.status === "UNRESOLVED" ? result.reason : undefined).toBe("unparseable-version")
    }))
})
