import type { DeclaredDependency } from "./types.js"

// CHANGE: parse requirements.txt lines into declared pip dependencies
// WHY: the pip half of the report comes from a line-oriented format with comments, extras and markers
// REF: req-requirements-1
// FORMAT THEOREM: ∀ line = "name cmp version": parse(line) = { name, anchor: version }
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: lines that are not requirements are skipped, never fatal
// COMPLEXITY: O(n) where n = number of lines

const REQUIREMENT_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[[^\]]*\])?\s*(.*)$/u
const CLAUSE_PATTERN = /^(===|==|~=|!=|>=|<=|<|>)\s*([^\s,]+)/u
const INLINE_COMMENT = /(?:^|\s)#.*$/u
// a trailing backslash on a comment line does not continue it
const COMMENT_LINE = /^\s*#/u

const logicalLines = (raw: string): ReadonlyArray<string> => {
  const result: Array<string> = []
  let pending = ""
  for (const line of raw.split(/\r?\n/u)) {
    if (line.endsWith("\\") && !COMMENT_LINE.test(line)) {
      pending += line.slice(0, -1)
      continue
    }
    result.push(pending + line)
    pending = ""
  }
  if (pending.length > 0) {
    result.push(pending)
  }
  return result
}

const cleanLine = (line: string): string => {
  const withoutComment = line.replace(INLINE_COMMENT, "")
  const markerIndex = withoutComment.indexOf(";")
  const withoutMarker = markerIndex === -1 ? withoutComment : withoutComment.slice(0, markerIndex)
  return withoutMarker.trim()
}

/**
 * Parse a single cleaned requirement line.
 *
 * @param line - Requirement without comments or environment markers.
 * @returns DeclaredDependency or undefined when the line is not a named requirement.
 *
 * @pure true
 * @invariant anchor is undefined iff no comparator clause is present
 * @complexity O(n)
 */
export const parseRequirementLine = (line: string): DeclaredDependency | undefined => {
  if (line.length === 0 || line.startsWith("-")) {
    return undefined
  }
  const match = REQUIREMENT_PATTERN.exec(line)
  if (match === null) {
    return undefined
  }
  const [, name = "", rest = ""] = match
  const constraint = rest.trim()
  if (constraint.length === 0 || constraint.startsWith("@")) {
    return { name, ecosystem: "pip", constraint, anchor: undefined }
  }
  const clause = CLAUSE_PATTERN.exec(constraint)
  if (clause === null) {
    return undefined
  }
  return { name, ecosystem: "pip", constraint, anchor: clause[2] }
}

/**
 * Parse requirements.txt contents into declared dependencies.
 *
 * @param raw - Full file contents.
 * @returns Dependencies in file order.
 *
 * @pure true
 * @invariant never fails: unparseable lines are dropped
 * @complexity O(n)
 */
export const parseRequirements = (raw: string): ReadonlyArray<DeclaredDependency> => {
  const result: Array<DeclaredDependency> = []
  for (const line of logicalLines(raw)) {
    const parsed = parseRequirementLine(cleanLine(line))
    if (parsed !== undefined) {
      result.push(parsed)
    }
  }
  return result
}
