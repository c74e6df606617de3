export class GitError extends Error {
  readonly exitCode: number
  readonly stderr: string

  constructor(message: string, exitCode: number, stderr = "") {
    super(message)
    this.name = "GitError"
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

export class NotARepositoryError extends GitError {
  constructor(exitCode: number, stderr = "") {
    super("Not inside a git repository", exitCode, stderr)
    this.name = "NotARepositoryError"
  }
}

export class StatusQueryError extends GitError {
  constructor(exitCode: number, stderr = "") {
    const detail = firstLine(stderr)
    super(detail ? `git status failed: ${detail}` : `git status failed with exit code ${exitCode}`, exitCode, stderr)
    this.name = "StatusQueryError"
  }
}

export const firstLine = (text: string): string => {
  const line = text.split(/\r?\n/).find((candidate) => candidate.trim().length > 0)
  return line?.trim() ?? ""
}
