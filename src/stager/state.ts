import type { FileEntry } from "../git/types.js"

export type StagerMode = "browsing" | "viewingDiff"

export interface SessionState {
  readonly entries: ReadonlyArray<FileEntry>
  readonly cursor: number
  readonly mode: StagerMode
  readonly diffText: string
  readonly scrollOffset: number
  readonly viewportHeight: number
  readonly quitting: boolean
  readonly notice: string | null
}

// Rows left once the file list and the footer row are accounted for.
export const computeViewportHeight = (terminalRows: number, entryCount: number): number => {
  const rows = Number.isFinite(terminalRows) ? Math.floor(terminalRows) : 0
  return Math.max(1, rows - entryCount - 1)
}

export const countDiffLines = (diffText: string): number => diffText.split("\n").length

export const computeMaxScroll = (state: Pick<SessionState, "diffText" | "viewportHeight">): number =>
  Math.max(0, countDiffLines(state.diffText) - state.viewportHeight)

export const createSessionState = (entries: ReadonlyArray<FileEntry>, terminalRows: number): SessionState => ({
  entries,
  cursor: 0,
  mode: "browsing",
  diffText: "",
  scrollOffset: 0,
  viewportHeight: computeViewportHeight(terminalRows, entries.length),
  quitting: false,
  notice: null,
})

export const currentEntry = (state: SessionState): FileEntry | undefined => state.entries[state.cursor]
