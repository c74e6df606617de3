import { NotARepositoryError, StatusQueryError } from "./errors.js"
import { createFileEntry } from "./statusInterpreter.js"
import type { FileEntry, GitRunner } from "./types.js"

export const STATUS_ARGS = ["status", "--porcelain=v1", "-z"] as const

// "XY p" is the shortest meaningful record.
const MIN_RECORD_LENGTH = 4

const carriesSourcePath = (code: string): boolean => /[RC]/.test(code)

/**
 * Parses NUL-separated `status --porcelain=v1 -z` output. Paths arrive
 * unquoted; rename and copy records are followed by a field holding the
 * source path, which is skipped.
 */
export const parseStatusOutput = (output: string): FileEntry[] => {
  const fields = output.split("\0")
  const entries: FileEntry[] = []
  for (let index = 0; index < fields.length; index += 1) {
    const record = fields[index]
    if (record.length < MIN_RECORD_LENGTH) continue
    const code = record.slice(0, 2)
    if (carriesSourcePath(code)) index += 1
    entries.push(createFileEntry(code, record.slice(3)))
  }
  return entries
}

export const assertInsideWorkTree = (git: GitRunner): void => {
  const check = git.run(["rev-parse", "--is-inside-work-tree"])
  if (check.exitCode !== 0 || check.stdout.trim() !== "true") {
    throw new NotARepositoryError(check.exitCode, check.stderr)
  }
}

export const loadSnapshot = (git: GitRunner): FileEntry[] => {
  assertInsideWorkTree(git)
  const status = git.run(STATUS_ARGS)
  if (status.exitCode !== 0) {
    throw new StatusQueryError(status.exitCode, status.stderr)
  }
  return parseStatusOutput(status.stdout)
}
