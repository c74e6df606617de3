import { firstLine } from "./errors.js"
import type { FileEntry, GitRunner } from "./types.js"

export const diffArgs = (entry: FileEntry): string[] => {
  switch (entry.classification) {
    case "staged":
      return ["diff", "--staged", "--", entry.name]
    case "unstaged":
    case "partiallyStaged":
      return ["diff", "HEAD", "--", entry.name]
  }
}

/** Never throws: a failed diff becomes the text shown in the viewer. */
export const fetchDiff = (git: GitRunner, entry: FileEntry): string => {
  const result = git.run(diffArgs(entry))
  if (result.exitCode !== 0) {
    const detail = firstLine(result.stderr) || `git exited with code ${result.exitCode}`
    return `Failed to show diff: ${detail}`
  }
  return result.stdout
}
