import { spawnSync } from "node:child_process"
import { noopLogger, type DebugLogger } from "../util/debugLog.js"
import type { GitAction, GitResult, GitRunner } from "./types.js"

const MAX_BUFFER = 64 * 1024 * 1024
const SPAWN_FAILURE_EXIT_CODE = 127

export interface GitRunnerOptions {
  readonly gitBinary?: string
  readonly cwd?: string
  readonly log?: DebugLogger
}

export const actionArgs = (action: GitAction): string[] => {
  switch (action.kind) {
    case "add":
      return ["add", "--", action.path]
    case "removeCached":
      return ["rm", "--cached", "-r", "--quiet", "--", action.path]
    case "restoreStaged":
      return ["restore", "--staged", "--", action.path]
  }
}

export const runAction = (git: GitRunner, action: GitAction): GitResult => git.run(actionArgs(action))

// Runs git synchronously; a spawn failure is reported as exit code 127.
export const createGitRunner = (options: GitRunnerOptions = {}): GitRunner => {
  const binary = options.gitBinary ?? "git"
  const log = options.log ?? noopLogger
  return {
    run: (args) => {
      const result = spawnSync(binary, [...args], {
        cwd: options.cwd,
        encoding: "utf8",
        maxBuffer: MAX_BUFFER,
        stdio: ["ignore", "pipe", "pipe"],
      })
      if (result.error) {
        log("git.spawnError", { args, message: result.error.message })
        return { exitCode: SPAWN_FAILURE_EXIT_CODE, stdout: "", stderr: result.error.message }
      }
      const exitCode = result.status ?? 1
      log("git.run", { args, exitCode })
      return { exitCode, stdout: result.stdout ?? "", stderr: result.stderr ?? "" }
    },
  }
}
