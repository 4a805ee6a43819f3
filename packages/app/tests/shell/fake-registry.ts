import { Effect } from "effect"

import type { RegistryError } from "../../src/core/errors.js"
import type { PackageIndex, PackageIndexes } from "../../src/shell/registry.js"

export type FakeAnswer =
  | { readonly _tag: "Versions"; readonly versions: ReadonlyArray<string> }
  | { readonly _tag: "Fail"; readonly error: RegistryError }
  | { readonly _tag: "Hang" }

export const versions = (...values: ReadonlyArray<string>): FakeAnswer => ({ _tag: "Versions", versions: values })
export const failWith = (error: RegistryError): FakeAnswer => ({ _tag: "Fail", error })
export const hang: FakeAnswer = { _tag: "Hang" }

const answer = (value: FakeAnswer): Effect.Effect<ReadonlyArray<string>, RegistryError> => {
  switch (value._tag) {
    case "Versions":
      return Effect.succeed(value.versions)
    case "Fail":
      return Effect.fail(value.error)
    case "Hang":
      return Effect.never
  }
}

export const fakeIndex = (answers: Readonly<Record<string, FakeAnswer>>): PackageIndex => ({
  listVersions: (name) => answer(answers[name] ?? versions())
})

export const fakeIndexes = (
  npm: Readonly<Record<string, FakeAnswer>>,
  pip: Readonly<Record<string, FakeAnswer>> = {}
): PackageIndexes => ({
  npm: fakeIndex(npm),
  pip: fakeIndex(pip)
})
