import type { Classification } from "../git/types.js"
import type { SessionState } from "../stager/state.js"
import { formatScrollPosition, sliceDiff } from "./diffViewport.js"
import type { RenderTheme } from "./theme.js"

const checkbox = (classification: Classification, theme: RenderTheme): string => {
  switch (classification) {
    case "staged":
      return theme.staged(theme.icons.checkboxStaged)
    case "partiallyStaged":
      return theme.unstaged(theme.icons.checkboxPartial)
    case "unstaged":
      return theme.unstaged(theme.icons.checkboxEmpty)
  }
}

const renderDiff = (state: SessionState, theme: RenderTheme): string => {
  const viewport = sliceDiff(state.diffText, state.scrollOffset, state.viewportHeight)
  const footer = [
    `${theme.icons.arrowsVertical}/${theme.icons.pageKeys} scroll ${formatScrollPosition(viewport)}`,
    "g: top",
    "G: bottom",
    "d: back",
    "q: quit",
  ].join("  ")
  return [...viewport.visible.map(theme.diffLine), theme.hint(footer)].join("\n")
}

const renderList = (state: SessionState, theme: RenderTheme): string => {
  const rows = state.entries.map((entry, index) => {
    const marker = theme.cursor(index === state.cursor ? `${theme.icons.cursor} ` : "  ")
    return `${marker}${checkbox(entry.classification, theme)} ${entry.name}`
  })
  const hint = theme.hint(`${theme.icons.arrowsVertical}: navigate  space: toggle  d: diff  q: quit`)
  const lines = [...rows, "", hint]
  if (state.notice) lines.push(theme.error(state.notice))
  return lines.join("\n")
}

export const renderFrame = (state: SessionState, theme: RenderTheme): string => {
  if (state.quitting) return ""
  return state.mode === "viewingDiff" ? renderDiff(state, theme) : renderList(state, theme)
}
