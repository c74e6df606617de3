import { GitError } from "../../git/errors.js"
import { loadSnapshot } from "../../git/snapshotLoader.js"
import type { GitRunner } from "../../git/types.js"
import { createSessionState, type SessionState } from "../../stager/state.js"
import { noopLogger, type DebugLogger } from "../../util/debugLog.js"

export const NO_CHANGES_MESSAGE = "No changes to stage or unstage."

export type StartupResult =
  | { readonly status: "ready"; readonly state: SessionState }
  | { readonly status: "empty"; readonly message: string; readonly exitCode: 0 }
  | { readonly status: "failed"; readonly message: string; readonly exitCode: 1 }

export const prepareSession = (git: GitRunner, terminalRows: number, log: DebugLogger = noopLogger): StartupResult => {
  try {
    const entries = loadSnapshot(git)
    if (entries.length === 0) {
      log("startup.empty")
      return { status: "empty", message: NO_CHANGES_MESSAGE, exitCode: 0 }
    }
    log("startup.ready", { entries: entries.length, terminalRows })
    return { status: "ready", state: createSessionState(entries, terminalRows) }
  } catch (error) {
    if (error instanceof GitError) {
      log("startup.failed", { error: error.name, exitCode: error.exitCode })
      return { status: "failed", message: `Error: ${error.message}`, exitCode: 1 }
    }
    throw error
  }
}
