import path from "node:path"
import { parseColorMode, resolveAsciiOnly, resolveColorMode, type ColorMode } from "../render/designSystem.js"

export interface AppConfig {
  readonly gitBinary: string
  readonly asciiOnly: boolean
  readonly colorMode: ColorMode
  readonly debugLogPath: string | null
}

export interface AppConfigOverrides {
  readonly gitBinary?: string | null
  readonly asciiOnly?: boolean | null
  readonly colorMode?: string | null
  readonly debugLogPath?: string | null
}

const DEFAULT_GIT_BINARY = "git"

const nonEmpty = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : null
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

const resolveColorOverride = (value: string | null | undefined): ColorMode | undefined => {
  const raw = nonEmpty(value)
  if (raw == null) return undefined
  const parsed = parseColorMode(raw)
  if (!parsed) {
    throw new ConfigError(`Unknown color mode "${raw}" (expected truecolor, ansi256, ansi16 or none)`)
  }
  return parsed
}

/** Command-line overrides win over GIT_STAGER_* environment variables, which win over defaults. */
export const loadAppConfig = (overrides: AppConfigOverrides = {}): AppConfig => {
  const gitBinary =
    nonEmpty(overrides.gitBinary) ?? nonEmpty(process.env.GIT_STAGER_GIT) ?? DEFAULT_GIT_BINARY
  const debugLog = nonEmpty(overrides.debugLogPath) ?? nonEmpty(process.env.GIT_STAGER_DEBUG_LOG)
  return {
    gitBinary,
    asciiOnly: resolveAsciiOnly(overrides.asciiOnly ?? undefined),
    colorMode: resolveColorMode(resolveColorOverride(overrides.colorMode)),
    debugLogPath: debugLog ? path.resolve(debugLog) : null,
  }
}
