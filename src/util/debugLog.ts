import { appendFileSync, mkdirSync } from "node:fs"
import path from "node:path"

export type DebugLogger = (event: string, payload?: Record<string, unknown>) => void

export const noopLogger: DebugLogger = () => undefined

/**
 * JSON-lines logger for diagnosing a session. Ink owns the terminal while the
 * stager runs, so records go to a file instead of stderr.
 */
export const createDebugLogger = (logPath: string | null): DebugLogger => {
  if (!logPath) return noopLogger
  const target = path.resolve(logPath)
  let ready = false
  let broken = false
  return (event, payload = {}) => {
    if (broken) return
    try {
      if (!ready) {
        mkdirSync(path.dirname(target), { recursive: true })
        ready = true
      }
      appendFileSync(target, `${JSON.stringify({ ts: Date.now(), event, ...payload })}\n`, "utf8")
    } catch (error) {
      broken = true
      process.emitWarning(`debug log disabled: ${error instanceof Error ? error.message : String(error)}`)
    }
  }
}
