export const BRAND_COLORS = {
  cursorBlue: "#4da3ff",
  stagedGreen: "#2ee59d",
  removedRed: "#ff4d6d",
  hunkCyan: "#5fd7d7",
} as const

export const NEUTRAL_COLORS = {
  midGray: "#8c8c96",
  dimGray: "#64646e",
} as const

export const SEMANTIC_COLORS = {
  cursor: BRAND_COLORS.cursorBlue,
  staged: BRAND_COLORS.stagedGreen,
  unstaged: NEUTRAL_COLORS.dimGray,
  added: BRAND_COLORS.stagedGreen,
  removed: BRAND_COLORS.removedRed,
  hunk: BRAND_COLORS.hunkCyan,
  hint: NEUTRAL_COLORS.midGray,
  error: BRAND_COLORS.removedRed,
} as const

export const ICONS = {
  cursor: ">",
  checkboxStaged: "[✓]",
  checkboxPartial: "[~]",
  checkboxEmpty: "[ ]",
  arrowsVertical: "↑/↓",
  pageKeys: "PageUp/PageDown",
} as const

export const ASCII_FALLBACK_ICONS = {
  cursor: ">",
  checkboxStaged: "[x]",
  checkboxPartial: "[~]",
  checkboxEmpty: "[ ]",
  arrowsVertical: "up/down",
  pageKeys: "PgUp/PgDn",
} as const

export type IconSet = { readonly [K in keyof typeof ICONS]: string }

export type ColorMode = "truecolor" | "ansi256" | "ansi16" | "none"

const BOOL_TRUE = ["1", "true", "yes", "on"]

const parseBooleanLike = (value: string | undefined): boolean | null => {
  const raw = (value ?? "").toLowerCase().trim()
  if (!raw) return null
  if (BOOL_TRUE.includes(raw)) return true
  if (["0", "false", "no", "off"].includes(raw)) return false
  return null
}

export const resolveAsciiOnly = (override?: boolean): boolean => {
  if (override != null) return override
  return parseBooleanLike(process.env.GIT_STAGER_ASCII) ?? false
}

export const resolveIcons = (asciiOnly?: boolean): IconSet =>
  resolveAsciiOnly(asciiOnly) ? ASCII_FALLBACK_ICONS : ICONS

export const parseColorMode = (value: string | undefined): ColorMode | null => {
  const raw = (value ?? "").toLowerCase().trim()
  if (!raw) return null
  if (["0", "none", "off", "false"].includes(raw)) return "none"
  if (["16", "ansi16", "basic"].includes(raw)) return "ansi16"
  if (["256", "ansi256"].includes(raw)) return "ansi256"
  if (["truecolor", "24bit", "true"].includes(raw)) return "truecolor"
  return null
}

export const resolveColorMode = (override?: ColorMode): ColorMode => {
  if (override) return override
  if (process.env.NO_COLOR) return "none"
  return parseColorMode(process.env.GIT_STAGER_COLOR_MODE) ?? "truecolor"
}
