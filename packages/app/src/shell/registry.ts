import * as HttpClient from "@effect/platform/HttpClient"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Layer from "effect/Layer"

import type { RegistryError } from "../core/errors.js"
import { malformedResponse, packageNotFound, registryUnreachable } from "../core/errors.js"
import {
  NPM_ACCEPT,
  npmPackageUrl,
  npmVersionsFromBody,
  pypiPackageUrl,
  pypiVersionsFromBody
} from "../core/registry.js"
import type { Ecosystem } from "../core/types.js"

// CHANGE: query npm and PyPI for the published versions of a package
// WHY: isolate HTTP behind a transport so lookups stay testable without a network
// REF: req-registry-io-1
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, RegistryError, never> per lookup
// INVARIANT: every transport or decode failure surfaces as a RegistryError, never as a defect
// COMPLEXITY: O(n) in response size

export interface RegistryTransport {
  readonly getJson: (url: string, accept: string) => Effect.Effect<unknown, RegistryError>
}

export const RegistryTransport = Context.GenericTag<RegistryTransport>("dep-drift/RegistryTransport")

const MAX_REDIRECTS = 5

const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300

const isRedirectStatus = (status: number): boolean => status >= 300 && status < 400

// PyPI answers non-canonical project names (flask → Flask) with a 301; Location may be relative
const getJsonFollowing = (
  client: HttpClient.HttpClient,
  url: string,
  accept: string,
  redirects: number
): Effect.Effect<unknown, RegistryError> =>
  Effect.gen(function*(_) {
    const response = yield* _(
      client.get(url, { headers: { accept } }).pipe(
        Effect.mapError((error) => registryUnreachable(url, error.message))
      )
    )
    const location = response.headers["location"]
    if (isRedirectStatus(response.status) && location !== undefined) {
      if (redirects >= MAX_REDIRECTS) {
        return yield* _(Effect.fail(registryUnreachable(url, `more than ${MAX_REDIRECTS} redirects`)))
      }
      return yield* _(getJsonFollowing(client, new URL(location, url).toString(), accept, redirects + 1))
    }
    if (response.status === 404) {
      return yield* _(Effect.fail(packageNotFound(url)))
    }
    if (!isSuccessStatus(response.status)) {
      return yield* _(Effect.fail(registryUnreachable(url, `HTTP ${response.status}`)))
    }
    return yield* _(
      response.json.pipe(Effect.mapError((error) => malformedResponse(url, error.message)))
    )
  }).pipe(Effect.scoped)

/**
 * Transport backed by the platform HTTP client.
 *
 * @pure false
 * @effect HttpClient
 * @invariant redirects are followed; 404 maps to PackageNotFound; any other non-2xx maps to RegistryUnreachable
 */
export const makeHttpTransport: Effect.Effect<RegistryTransport, never, HttpClient.HttpClient> = Effect.map(
  HttpClient.HttpClient,
  (client) => RegistryTransport.of({ getJson: (url, accept) => getJsonFollowing(client, url, accept, 0) })
)

export const HttpTransportLive = Layer.effect(RegistryTransport, makeHttpTransport)

export interface PackageIndex {
  readonly listVersions: (name: string) => Effect.Effect<ReadonlyArray<string>, RegistryError>
}

export type PackageIndexes = Readonly<Record<Ecosystem, PackageIndex>>

export interface RegistryEndpoints {
  readonly npmRegistry: string
  readonly pypiRegistry: string
}

const decodeBody = (
  url: string,
  decode: (body: unknown) => Either.Either<ReadonlyArray<string>, string>
) =>
(body: unknown): Effect.Effect<ReadonlyArray<string>, RegistryError> =>
  Either.match(decode(body), {
    onLeft: (message) => Effect.fail(malformedResponse(url, message)),
    onRight: (versions) => Effect.succeed(versions)
  })

export const makeNpmIndex = (transport: RegistryTransport, registry: string): PackageIndex => ({
  listVersions: (name) => {
    const url = npmPackageUrl(registry, name)
    return transport.getJson(url, NPM_ACCEPT).pipe(Effect.flatMap(decodeBody(url, npmVersionsFromBody)))
  }
})

export const makePypiIndex = (transport: RegistryTransport, registry: string): PackageIndex => ({
  listVersions: (name) => {
    const url = pypiPackageUrl(registry, name)
    return transport.getJson(url, "application/json").pipe(Effect.flatMap(decodeBody(url, pypiVersionsFromBody)))
  }
})

export const makePackageIndexes = (transport: RegistryTransport, endpoints: RegistryEndpoints): PackageIndexes => ({
  npm: makeNpmIndex(transport, endpoints.npmRegistry),
  pip: makePypiIndex(transport, endpoints.pypiRegistry)
})
