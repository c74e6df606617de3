import { computeMaxScroll } from "../stager/state.js"

export interface DiffViewport {
  readonly totalLines: number
  readonly offset: number
  /** 1-based number of the last line on screen. */
  readonly lastLine: number
  readonly visible: ReadonlyArray<string>
}

/** The slice of a diff the viewer shows, with the offset pulled back inside [0, maxScroll]. */
export const sliceDiff = (diffText: string, scrollOffset: number, viewportHeight: number): DiffViewport => {
  const lines = diffText.split("\n")
  const height = Math.max(1, Math.floor(viewportHeight))
  const requested = Number.isFinite(scrollOffset) ? Math.floor(scrollOffset) : 0
  const offset = Math.max(0, Math.min(requested, computeMaxScroll({ diffText, viewportHeight: height })))
  const lastLine = Math.min(lines.length, offset + height)
  return { totalLines: lines.length, offset, lastLine, visible: lines.slice(offset, lastLine) }
}

export const formatScrollPosition = (viewport: DiffViewport): string => `(${viewport.lastLine}/${viewport.totalLines})`
