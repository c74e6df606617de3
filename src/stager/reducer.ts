import { fetchDiff } from "../git/diffFetcher.js"
import { firstLine } from "../git/errors.js"
import { runAction } from "../git/runner.js"
import type { FileEntry, GitRunner } from "../git/types.js"
import { noopLogger, type DebugLogger } from "../util/debugLog.js"
import type { StagerEvent } from "./events.js"
import { computeMaxScroll, computeViewportHeight, currentEntry, type SessionState } from "./state.js"

export interface StagerDeps {
  readonly git: GitRunner
  readonly log?: DebugLogger
}

const wrapIndex = (index: number, length: number): number => ((index % length) + length) % length

const clampScroll = (state: SessionState, requested: number): number =>
  Math.max(0, Math.min(computeMaxScroll(state), requested))

const halfPage = (state: SessionState): number => Math.floor(state.viewportHeight / 2)

const loadDiff = (state: SessionState, deps: StagerDeps): SessionState => {
  const entry = currentEntry(state)
  if (!entry) return { ...state, diffText: "", scrollOffset: 0 }
  return { ...state, diffText: fetchDiff(deps.git, entry), scrollOffset: 0 }
}

const moveCursor = (state: SessionState, delta: number, deps: StagerDeps): SessionState => {
  if (state.entries.length === 0) return state
  const moved: SessionState = {
    ...state,
    cursor: wrapIndex(state.cursor + delta, state.entries.length),
    scrollOffset: 0,
    notice: null,
  }
  return moved.mode === "viewingDiff" ? loadDiff(moved, deps) : moved
}

const replaceEntry = (entries: ReadonlyArray<FileEntry>, index: number, next: FileEntry): FileEntry[] =>
  entries.map((entry, idx) => (idx === index ? next : entry))

const toggleEntry = (state: SessionState, deps: StagerDeps): SessionState => {
  const entry = currentEntry(state)
  if (!entry) return state
  const log = deps.log ?? noopLogger
  const staging = entry.classification !== "staged"
  const action = staging ? entry.stageAction : entry.unstageAction
  const result = runAction(deps.git, action)
  if (result.exitCode !== 0) {
    const verb = staging ? "stage" : "unstage"
    const detail = firstLine(result.stderr) || `git exited with code ${result.exitCode}`
    log("toggle.failed", { path: entry.name, action: action.kind, exitCode: result.exitCode })
    return { ...state, notice: `Failed to ${verb} ${entry.name}: ${detail}` }
  }
  log("toggle.applied", { path: entry.name, action: action.kind })
  const updated: FileEntry = { ...entry, classification: staging ? "staged" : "unstaged" }
  return { ...state, entries: replaceEntry(state.entries, state.cursor, updated), notice: null }
}

const scrollBy = (state: SessionState, delta: number): SessionState => ({
  ...state,
  scrollOffset: clampScroll(state, state.scrollOffset + delta),
})

const processBrowsing = (state: SessionState, event: StagerEvent, deps: StagerDeps): SessionState => {
  switch (event.type) {
    case "up":
      return moveCursor(state, -1, deps)
    case "down":
      return moveCursor(state, 1, deps)
    case "toggle":
      return toggleEntry(state, deps)
    case "toggleDiff":
      return loadDiff({ ...state, mode: "viewingDiff", notice: null }, deps)
    default:
      return state
  }
}

const processViewingDiff = (state: SessionState, event: StagerEvent, deps: StagerDeps): SessionState => {
  switch (event.type) {
    case "up":
      return state.scrollOffset > 0 ? scrollBy(state, -1) : moveCursor(state, -1, deps)
    case "down":
      return state.scrollOffset < computeMaxScroll(state) ? scrollBy(state, 1) : moveCursor(state, 1, deps)
    case "pageDown":
      return scrollBy(state, halfPage(state))
    case "pageUp":
      return scrollBy(state, -halfPage(state))
    case "top":
      return { ...state, scrollOffset: 0 }
    case "bottom":
      return { ...state, scrollOffset: computeMaxScroll(state) }
    case "toggleDiff":
      return { ...state, mode: "browsing" }
    default:
      return state
  }
}

/**
 * Applies one input event. Pure apart from the git calls made through `deps`:
 * toggling runs a staging mutation, and entering the viewer or moving the
 * cursor inside it fetches a diff.
 */
export const processEvent = (state: SessionState, event: StagerEvent, deps: StagerDeps): SessionState => {
  if (state.quitting) return state
  switch (event.type) {
    case "quit":
      return { ...state, quitting: true }
    case "resize": {
      const resized = { ...state, viewportHeight: computeViewportHeight(event.rows, state.entries.length) }
      return { ...resized, scrollOffset: clampScroll(resized, resized.scrollOffset) }
    }
    default:
      return state.mode === "viewingDiff"
        ? processViewingDiff(state, event, deps)
        : processBrowsing(state, event, deps)
  }
}
