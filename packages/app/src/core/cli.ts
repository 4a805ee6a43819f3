import { Match } from "effect"
import * as Either from "effect/Either"
import type * as LogLevel from "effect/LogLevel"

// CHANGE: implement deterministic CLI parsing for dep-drift
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "render"

export interface CliArgs {
  readonly command: CliCommand
  readonly dir: string
  readonly configPath: string | undefined
  readonly inputPath: string | undefined
  readonly outputPath: string | undefined
  readonly json: boolean
  readonly silent: boolean
  readonly concurrency: number | undefined
  readonly timeoutMs: number | undefined
  readonly deadlineMs: number | undefined
  readonly includePrerelease: boolean | undefined
  readonly npmRegistry: string | undefined
  readonly pypiRegistry: string | undefined
  readonly failOnOutdated: boolean | undefined
  readonly logLevel: LogLevel.Literal | undefined
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parsePositiveInteger = (flagName: string, value: string): Either.Either<number, CliError> => {
  const parsed = Number(value)
  if (!/^\d+$/u.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    return Either.left(cliError(`--${flagName} expects a positive integer, got: ${value}`))
  }
  return Either.right(parsed)
}

const logLevels: Readonly<Record<string, LogLevel.Literal>> = {
  all: "All",
  trace: "Trace",
  debug: "Debug",
  info: "Info",
  warning: "Warning",
  error: "Error",
  fatal: "Fatal",
  none: "None"
}

const parseLogLevel = (value: string): Either.Either<LogLevel.Literal, CliError> => {
  const level = logLevels[value.toLowerCase()]
  return level === undefined ? Either.left(cliError(`Unknown log level: ${value}`)) : Either.right(level)
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("render", () => Either.right<CliCommand>("render")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  dir: ".",
  configPath: undefined,
  inputPath: undefined,
  outputPath: undefined,
  json: false,
  silent: false,
  concurrency: undefined,
  timeoutMs: undefined,
  deadlineMs: undefined,
  includePrerelease: undefined,
  npmRegistry: undefined,
  pypiRegistry: undefined,
  failOnOutdated: undefined,
  logLevel: undefined
})

type ParsedFlag = { readonly next: CliArgs; readonly consumed: number }

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

const asString = (value: string): Either.Either<string, CliError> => Either.right(value)

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue)
    && (nextValue === "true" || nextValue === "false" || nextValue === "1" || nextValue === "0")
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const positive = (flagName: string) => (value: string) => parsePositiveInteger(flagName, value)

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  "fail-on-outdated": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      failOnOutdated: value
    })),
  prerelease: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      includePrerelease: value
    })),
  dir: (current, inlineValue, nextValue) =>
    parseValueFlag("dir", current, inlineValue, nextValue, asString, (args, value) => ({ ...args, dir: value })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      configPath: value
    })),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      inputPath: value
    })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      outputPath: value
    })),
  concurrency: (current, inlineValue, nextValue) =>
    parseValueFlag("concurrency", current, inlineValue, nextValue, positive("concurrency"), (args, value) => ({
      ...args,
      concurrency: value
    })),
  timeout: (current, inlineValue, nextValue) =>
    parseValueFlag("timeout", current, inlineValue, nextValue, positive("timeout"), (args, value) => ({
      ...args,
      timeoutMs: value
    })),
  deadline: (current, inlineValue, nextValue) =>
    parseValueFlag("deadline", current, inlineValue, nextValue, positive("deadline"), (args, value) => ({
      ...args,
      deadlineMs: value
    })),
  "npm-registry": (current, inlineValue, nextValue) =>
    parseValueFlag("npm-registry", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      npmRegistry: value
    })),
  "pypi-registry": (current, inlineValue, nextValue) =>
    parseValueFlag("pypi-registry", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      pypiRegistry: value
    })),
  "log-level": (current, inlineValue, nextValue) =>
    parseValueFlag("log-level", current, inlineValue, nextValue, parseLogLevel, (args, value) => ({
      ...args,
      logLevel: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "check", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to check when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(
    parseCommandFromArgs(rawArgs),
    (parsed) => parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command))
  )
}
