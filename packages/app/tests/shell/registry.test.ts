import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { RegistryError } from "../../src/core/errors.js"
import { registryUnreachable } from "../../src/core/errors.js"
import { NPM_ACCEPT } from "../../src/core/registry.js"
import type { RegistryTransport } from "../../src/shell/registry.js"
import { makeNpmIndex, makePypiIndex } from "../../src/shell/registry.js"

interface Recorded {
  readonly url: string
  readonly accept: string
}

const recordingTransport = (
  respond: (url: string) => Effect.Effect<unknown, RegistryError>
): { readonly transport: RegistryTransport; readonly calls: Array<Recorded> } => {
  const calls: Array<Recorded> = []
  return {
    calls,
    transport: {
      getJson: (url, accept) =>
        Effect.suspend(() => {
          calls.push({ url, accept })
          return respond(url)
        })
    }
  }
}

describe("npm index", () => {
  it.effect("requests the abbreviated packument of a scoped package", () =>
    Effect.gen(function*(_) {
      const { calls, transport } = recordingTransport(() =>
        Effect.succeed({ name: "@scope/pkg", versions: { "1.0.0": {}, "1.2.0": {} } })
      )
      const listed = yield* _(makeNpmIndex(transport, "https://npm.example/").listVersions("@scope/pkg"))
      expect(listed).toEqual(["1.0.0", "1.2.0"])
      expect(calls).toEqual([{ url: "https://npm.example/@scope%2Fpkg", accept: NPM_ACCEPT }])
    }))

  it.effect("turns an unexpected body into MalformedResponse", () =>
    Effect.gen(function*(_) {
      const { transport } = recordingTransport(() => Effect.succeed({ error: "gone" }))
      const result = yield* _(Effect.either(makeNpmIndex(transport, "https://npm.example").listVersions("a")))
      expect(Either.isLeft(result) ? result.left._tag : undefined).toBe("MalformedResponse")
    }))

  it.effect("passes transport failures through unchanged", () =>
    Effect.gen(function*(_) {
      const failure = registryUnreachable("https://npm.example/a", "HTTP 503")
      const { transport } = recordingTransport(() => Effect.fail(failure))
      const result = yield* _(Effect.either(makeNpmIndex(transport, "https://npm.example").listVersions("a")))
      expect(result).toEqual(Either.left(failure))
    }))
})

describe("PyPI index", () => {
  it.effect("reads non-yanked releases from the JSON API", () =>
    Effect.gen(function*(_) {
      const { calls, transport } = recordingTransport(() =>
        Effect.succeed({ releases: { "2.25.0": [{ yanked: false }], "2.26.0": [{ yanked: true }] } })
      )
      const listed = yield* _(makePypiIndex(transport, "https://pypi.example").listVersions("requests"))
      expect(listed).toEqual(["2.25.0"])
      expect(calls).toEqual([{ url: "https://pypi.example/pypi/requests/json", accept: "application/json" }])
    }))
})
