import { Chalk, type ChalkInstance } from "chalk"
import { SEMANTIC_COLORS, resolveIcons, type ColorMode, type IconSet } from "./designSystem.js"

export type Paint = (text: string) => string

export interface RenderTheme {
  readonly icons: IconSet
  readonly cursor: Paint
  readonly staged: Paint
  readonly unstaged: Paint
  readonly hint: Paint
  readonly error: Paint
  readonly diffLine: Paint
}

export interface RenderThemeOptions {
  readonly colorMode: ColorMode
  readonly asciiOnly: boolean
}

const CHALK_LEVELS: Record<ColorMode, 0 | 1 | 2 | 3> = {
  none: 0,
  ansi16: 1,
  ansi256: 2,
  truecolor: 3,
}

const paintDiffLine = (chalk: ChalkInstance): Paint => {
  const added = chalk.hex(SEMANTIC_COLORS.added)
  const removed = chalk.hex(SEMANTIC_COLORS.removed)
  const hunk = chalk.hex(SEMANTIC_COLORS.hunk)
  return (line) => {
    if (line.startsWith("+++") || line.startsWith("---") || line.startsWith("diff ")) return chalk.bold(line)
    if (line.startsWith("@@")) return hunk(line)
    if (line.startsWith("+")) return added(line)
    if (line.startsWith("-")) return removed(line)
    return line
  }
}

export const createRenderTheme = (options: RenderThemeOptions): RenderTheme => {
  const chalk = new Chalk({ level: CHALK_LEVELS[options.colorMode] })
  return {
    icons: resolveIcons(options.asciiOnly),
    cursor: chalk.hex(SEMANTIC_COLORS.cursor),
    staged: chalk.hex(SEMANTIC_COLORS.staged),
    unstaged: chalk.hex(SEMANTIC_COLORS.unstaged),
    hint: chalk.hex(SEMANTIC_COLORS.hint),
    error: chalk.hex(SEMANTIC_COLORS.error),
    diffLine: paintDiffLine(chalk),
  }
}

export const PLAIN_THEME: RenderTheme = createRenderTheme({ colorMode: "none", asciiOnly: false })
