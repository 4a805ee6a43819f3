import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { parseRequirementLine, parseRequirements } from "../../src/core/requirements.js"

describe("parseRequirementLine", () => {
  it.effect("reads pinned and ranged requirements", () =>
    Effect.sync(() => {
      expect(parseRequirementLine("numpy==1.21.0")).toEqual({
        name: "numpy",
        ecosystem: "pip",
        constraint: "==1.21.0",
        anchor: "1.21.0"
      })
      expect(parseRequirementLine("flask>=2.0,<3.0")?.anchor).toBe("2.0")
      expect(parseRequirementLine("django ~= 4.2")?.anchor).toBe("4.2")
    }))

  it.effect("ignores extras when reading the name", () =>
    Effect.sync(() => {
      const parsed = parseRequirementLine("uvicorn[standard]==0.30.1")
      expect(parsed?.name).toBe("uvicorn")
      expect(parsed?.anchor).toBe("0.30.1")
    }))

  it.effect("keeps bare names with no anchor", () =>
    Effect.sync(() => {
      expect(parseRequirementLine("requests")).toEqual({
        name: "requests",
        ecosystem: "pip",
        constraint: "",
        anchor: undefined
      })
    }))

  it.effect("skips options and blank lines", () =>
    Effect.sync(() => {
      expect(parseRequirementLine("")).toBeUndefined()
      expect(parseRequirementLine("-r base.txt")).toBeUndefined()
      expect(parseRequirementLine("--index-url https://example.invalid/simple")).toBeUndefined()
    }))
})

describe("parseRequirements", () => {
  it.effect("keeps file order and drops comments and markers", () =>
    Effect.sync(() => {
      const raw = [
        "# runtime",
        "requests==2.25.0  # pinned for tests",
        "",
        "pywin32==306 ; sys_platform == 'win32'",
        "-e .",
        "numpy>=1.21 \\",
        "  ,<2"
      ].join("\n")
      const parsed = parseRequirements(raw)
      expect(parsed.map((dep) => [dep.name, dep.anchor])).toEqual([
        ["requests", "2.25.0"],
        ["pywin32", "306"],
        ["numpy", "1.21"]
      ])
    }))

  it.effect("does not continue a comment line that ends with a backslash", () =>
    Effect.sync(() => {
      const parsed = parseRequirements("# installed from C:\\\nrequests==2.32.3\nflask==3.0.0\n")
      expect(parsed.map((dep) => dep.name)).toEqual(["requests", "flask"])
    }))

  it.effect("handles CRLF line endings", () =>
    Effect.sync(() => {
      const parsed = parseRequirements("a==1.0\r\nb==2.0\r\n")
      expect(parsed.map((dep) => dep.name)).toEqual(["a", "b"])
    }))
})
