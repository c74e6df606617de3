import React from "react"
import { Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { render } from "ink"
import { loadAppConfig, type AppConfig } from "../../config/appConfig.js"
import { createGitRunner } from "../../git/runner.js"
import type { GitRunner } from "../../git/types.js"
import { createRenderTheme } from "../../render/theme.js"
import type { SessionState } from "../../stager/state.js"
import { StagerView } from "../../ui/StagerView.js"
import { createDebugLogger, type DebugLogger } from "../../util/debugLog.js"
import { prepareSession } from "./startup.js"

const DEFAULT_TERMINAL_ROWS = 24

const asciiOption = Options.boolean("ascii").pipe(Options.withDescription("Use ASCII glyphs only"))
const colorModeOption = Options.choice("color-mode", ["truecolor", "ansi256", "ansi16", "none"] as const).pipe(
  Options.withDescription("Colour depth for the UI (defaults to GIT_STAGER_COLOR_MODE, then truecolor)"),
  Options.optional,
)
const gitOption = Options.text("git").pipe(Options.withDescription("Path to the git executable"), Options.optional)
const debugLogOption = Options.text("debug-log").pipe(
  Options.withDescription("Append JSON-lines debug records to this file"),
  Options.optional,
)

/** A startup failure whose message has already been formatted for the terminal. */
export class StagerExit extends Error {
  constructor(message: string) {
    super(message)
    this.name = "StagerExit"
  }
}

const runInteractive = async (config: AppConfig, initialState: SessionState, git: GitRunner, log: DebugLogger) => {
  const theme = createRenderTheme({ colorMode: config.colorMode, asciiOnly: config.asciiOnly })
  const ink = render(<StagerView initialState={initialState} git={git} theme={theme} log={log} />, {
    exitOnCtrlC: false,
  })
  try {
    await ink.waitUntilExit()
  } finally {
    ink.cleanup()
    log("session.closed")
  }
}

export const stagerCommand = Command.make(
  "git-stager",
  { ascii: asciiOption, colorMode: colorModeOption, git: gitOption, debugLog: debugLogOption },
  ({ ascii, colorMode, git, debugLog }) =>
    Effect.tryPromise({
      try: async () => {
        const config = loadAppConfig({
          asciiOnly: ascii ? true : null,
          colorMode: Option.getOrNull(colorMode),
          gitBinary: Option.getOrNull(git),
          debugLogPath: Option.getOrNull(debugLog),
        })
        const log = createDebugLogger(config.debugLogPath)
        const runner = createGitRunner({ gitBinary: config.gitBinary, log })
        const startup = prepareSession(runner, process.stdout.rows ?? DEFAULT_TERMINAL_ROWS, log)
        if (startup.status === "failed") {
          throw new StagerExit(startup.message)
        }
        if (startup.status === "empty") {
          console.log(startup.message)
          return
        }
        await runInteractive(config, startup.state, runner, log)
      },
      catch: (error) =>
        error instanceof StagerExit
          ? error
          : new StagerExit(`Error: ${error instanceof Error ? error.message : String(error)}`),
    }).pipe(Effect.tapError((error) => Console.error(error.message))),
)
