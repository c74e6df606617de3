import type { Classification, FileEntry, GitAction } from "./types.js"

export interface StatusInterpretation {
  readonly classification: Classification
  readonly stageAction: GitAction
  readonly unstageAction: GitAction
}

const interpretation = (
  classification: Classification,
  path: string,
  unstageKind: "removeCached" | "restoreStaged",
): StatusInterpretation => ({
  classification,
  stageAction: { kind: "add", path },
  unstageAction: { kind: unstageKind, path },
})

/**
 * Maps a porcelain XY code to a classification and the git actions that stage
 * or unstage the path.
 *
 * Rows are evaluated top to bottom. `??` and `A?` must win over the generic
 * both-sides-dirty row: a path added in the index has no HEAD blob, so only
 * `rm --cached` can take it back out.
 */
export const interpretStatus = (code: string, path: string): StatusInterpretation => {
  const x = code.charAt(0) || " "
  const y = code.charAt(1) || " "

  if (x === "?" && y === "?") return interpretation("unstaged", path, "removeCached")
  if (x === "A" && y !== " ") return interpretation("partiallyStaged", path, "removeCached")
  if (x !== " " && y !== " ") return interpretation("partiallyStaged", path, "restoreStaged")
  if (x === "A") return interpretation("staged", path, "removeCached")
  if (x !== " ") return interpretation("staged", path, "restoreStaged")
  return interpretation("unstaged", path, "restoreStaged")
}

export const createFileEntry = (code: string, name: string): FileEntry => ({
  name,
  ...interpretStatus(code, name),
})
