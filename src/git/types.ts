export type Classification = "unstaged" | "staged" | "partiallyStaged"

export type GitActionKind = "add" | "removeCached" | "restoreStaged"

export interface GitAction {
  readonly kind: GitActionKind
  readonly path: string
}

export interface FileEntry {
  readonly name: string
  readonly classification: Classification
  readonly stageAction: GitAction
  readonly unstageAction: GitAction
}

export interface GitResult {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
}

export interface GitRunner {
  run(args: ReadonlyArray<string>): GitResult
}
