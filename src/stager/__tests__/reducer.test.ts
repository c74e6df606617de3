import { describe, expect, it } from "vitest"
import { createFakeGit, type FakeResponse } from "../../../tests/helpers/fakeGit.js"
import { createFileEntry } from "../../git/statusInterpreter.js"
import type { StagerEvent } from "../events.js"
import { processEvent } from "../reducer.js"
import { computeMaxScroll, createSessionState, type SessionState } from "../state.js"

const makeLines = (count: number): string => Array.from({ length: count }, (_, idx) => `line ${idx + 1}`).join("\n")

const sessionOf = (codes: ReadonlyArray<readonly [string, string]>, overrides: Partial<SessionState> = {}): SessionState => ({
  ...createSessionState(
    codes.map(([code, name]) => createFileEntry(code, name)),
    40,
  ),
  ...overrides,
})

const THREE_FILES = [
  ["??", "a.txt"],
  [" M", "b.txt"],
  ["M ", "c.txt"],
] as const

const run = (state: SessionState, events: ReadonlyArray<StagerEvent>, responses: Record<string, FakeResponse> = {}) => {
  const git = createFakeGit(responses)
  const final = events.reduce((current, event) => processEvent(current, event, { git: git.runner }), state)
  return { state: final, calls: git.calls }
}

describe("cursor navigation", () => {
  it("wraps from the first entry to the last and back", () => {
    const start = sessionOf(THREE_FILES)
    expect(run(start, [{ type: "up" }]).state.cursor).toBe(2)
    expect(run({ ...start, cursor: 2 }, [{ type: "down" }]).state.cursor).toBe(0)
  })

  it.each([1, 2, 5])("returns to the starting row after N presses for N = %i", (size) => {
    const codes = Array.from({ length: size }, (_, idx) => [" M", `f${idx}.txt`] as const)
    for (let startIndex = 0; startIndex < size; startIndex += 1) {
      const start = sessionOf(codes, { cursor: startIndex })
      const ups = Array.from({ length: size }, (): StagerEvent => ({ type: "up" }))
      const downs = Array.from({ length: size }, (): StagerEvent => ({ type: "down" }))
      expect(run(start, ups).state.cursor).toBe(startIndex)
      expect(run(start, downs).state.cursor).toBe(startIndex)
    }
  })

  it("does not call git while browsing", () => {
    const { calls } = run(sessionOf(THREE_FILES), [{ type: "down" }, { type: "up" }, { type: "up" }])
    expect(calls).toEqual([])
  })
})

describe("toggle", () => {
  it("flips staged and unstaged without inventing a third value", () => {
    const start = sessionOf([["M ", "c.txt"]])
    const once = run(start, [{ type: "toggle" }])
    expect(once.state.entries[0].classification).toBe("unstaged")
    expect(once.calls).toEqual([["restore", "--staged", "--", "c.txt"]])

    const twice = run(once.state, [{ type: "toggle" }])
    expect(twice.state.entries[0].classification).toBe("staged")
    expect(twice.calls).toEqual([["add", "--", "c.txt"]])
  })

  it("stages a partially staged file", () => {
    const { state, calls } = run(sessionOf([["AM", "n.txt"]]), [{ type: "toggle" }])
    expect(state.entries[0].classification).toBe("staged")
    expect(calls).toEqual([["add", "--", "n.txt"]])
  })

  it("unstages an added file by removing it from the index", () => {
    const { calls } = run(sessionOf([["A ", "n.txt"]]), [{ type: "toggle" }])
    expect(calls).toEqual([["rm", "--cached", "-r", "--quiet", "--", "n.txt"]])
  })

  it("keeps the classification and reports when git refuses", () => {
    const start = sessionOf(THREE_FILES)
    const failed = run(start, [{ type: "toggle" }], {
      "add -- a.txt": { exitCode: 128, stderr: "fatal: pathspec 'a.txt' did not match any files\n" },
    })
    expect(failed.state.entries[0].classification).toBe("unstaged")
    expect(failed.state.notice).toBe("Failed to stage a.txt: fatal: pathspec 'a.txt' did not match any files")

    const moved = run(failed.state, [{ type: "down" }])
    expect(moved.state.notice).toBeNull()
  })

  it("only touches the entry under the cursor", () => {
    const { state } = run(sessionOf(THREE_FILES, { cursor: 1 }), [{ type: "toggle" }])
    expect(state.entries.map((entry) => entry.classification)).toEqual(["unstaged", "staged", "staged"])
  })

  it("is ignored in the diff viewer", () => {
    const start = sessionOf(THREE_FILES, { mode: "viewingDiff", diffText: "x" })
    const { state, calls } = run(start, [{ type: "toggle" }])
    expect(state).toBe(start)
    expect(calls).toEqual([])
  })
})

describe("diff viewer", () => {
  it("fetches the diff for the selected entry when entered", () => {
    const { state, calls } = run(sessionOf(THREE_FILES, { cursor: 2 }), [{ type: "toggleDiff" }], {
      "diff --staged -- c.txt": { stdout: "+staged\n" },
    })
    expect(state.mode).toBe("viewingDiff")
    expect(state.diffText).toBe("+staged\n")
    expect(state.scrollOffset).toBe(0)
    expect(calls).toEqual([["diff", "--staged", "--", "c.txt"]])
  })

  it("returns to the list without calling git", () => {
    const start = sessionOf(THREE_FILES, { mode: "viewingDiff", diffText: "x" })
    const { state, calls } = run(start, [{ type: "toggleDiff" }])
    expect(state.mode).toBe("browsing")
    expect(calls).toEqual([])
  })

  it("advances half a viewport on page down", () => {
    const start = sessionOf([[" M", "b.txt"]], { mode: "viewingDiff", diffText: makeLines(100), viewportHeight: 20 })
    expect(run(start, [{ type: "pageDown" }]).state.scrollOffset).toBe(10)
    const many = Array.from({ length: 12 }, (): StagerEvent => ({ type: "pageDown" }))
    expect(run(start, many).state.scrollOffset).toBe(80)
  })

  it("stops page up at the top", () => {
    const start = sessionOf([[" M", "b.txt"]], {
      mode: "viewingDiff",
      diffText: makeLines(100),
      viewportHeight: 20,
      scrollOffset: 5,
    })
    expect(run(start, [{ type: "pageUp" }]).state.scrollOffset).toBe(0)
  })

  it("jumps to the top and bottom", () => {
    const start = sessionOf([[" M", "b.txt"]], {
      mode: "viewingDiff",
      diffText: makeLines(50),
      viewportHeight: 20,
      scrollOffset: 7,
    })
    expect(run(start, [{ type: "bottom" }]).state.scrollOffset).toBe(30)
    expect(run(start, [{ type: "top" }]).state.scrollOffset).toBe(0)
  })

  it("scrolls line by line before leaving the current file", () => {
    const start = sessionOf(THREE_FILES, { mode: "viewingDiff", diffText: makeLines(25), viewportHeight: 20 })
    const { state, calls } = run(start, [{ type: "down" }, { type: "down" }])
    expect(state.cursor).toBe(0)
    expect(state.scrollOffset).toBe(2)
    expect(calls).toEqual([])
  })

  it("moves to the next file at the bottom and refreshes the diff", () => {
    const start = sessionOf(THREE_FILES, {
      mode: "viewingDiff",
      diffText: makeLines(25),
      viewportHeight: 20,
      scrollOffset: 5,
    })
    const { state, calls } = run(start, [{ type: "down" }], { "diff HEAD -- b.txt": { stdout: "+b\n" } })
    expect(state.cursor).toBe(1)
    expect(state.scrollOffset).toBe(0)
    expect(state.diffText).toBe("+b\n")
    expect(calls).toEqual([["diff", "HEAD", "--", "b.txt"]])
  })

  it("wraps to the last file when scrolling up past the top", () => {
    const start = sessionOf(THREE_FILES, { mode: "viewingDiff", diffText: makeLines(3), viewportHeight: 20 })
    const { state, calls } = run(start, [{ type: "up" }], { "diff --staged -- c.txt": { stdout: "+c\n" } })
    expect(state.cursor).toBe(2)
    expect(state.diffText).toBe("+c\n")
    expect(calls).toEqual([["diff", "--staged", "--", "c.txt"]])
  })

  it("keeps the scroll offset inside [0, maxScroll] for any event sequence", () => {
    const pattern: StagerEvent[] = [
      { type: "pageDown" },
      { type: "down" },
      { type: "bottom" },
      { type: "down" },
      { type: "resize", rows: 14 },
      { type: "pageUp" },
      { type: "up" },
      { type: "up" },
      { type: "top" },
      { type: "resize", rows: 30 },
      { type: "up" },
    ]
    let state = sessionOf([[" M", "only.txt"]], { mode: "viewingDiff", diffText: makeLines(37), viewportHeight: 9 })
    const git = createFakeGit({ "diff HEAD -- only.txt": { stdout: makeLines(37) } })
    for (let step = 0; step < 66; step += 1) {
      const event = pattern[(step * 7) % pattern.length]
      state = processEvent(state, event, { git: git.runner })
      expect(state.scrollOffset).toBeGreaterThanOrEqual(0)
      expect(state.scrollOffset).toBeLessThanOrEqual(computeMaxScroll(state))
    }
  })

  it("ignores scroll keys while browsing", () => {
    const start = sessionOf(THREE_FILES)
    const events: StagerEvent[] = [{ type: "pageUp" }, { type: "pageDown" }, { type: "top" }, { type: "bottom" }]
    for (const event of events) {
      expect(processEvent(start, event, { git: createFakeGit().runner })).toBe(start)
    }
  })
})

describe("resize and quit", () => {
  it("recomputes the viewport from the terminal height and clamps the scroll", () => {
    const start = sessionOf(THREE_FILES, {
      mode: "viewingDiff",
      diffText: makeLines(100),
      viewportHeight: 20,
      scrollOffset: 80,
    })
    const { state } = run(start, [{ type: "resize", rows: 60 }])
    expect(state.viewportHeight).toBe(56)
    expect(state.scrollOffset).toBe(44)
  })

  it("never shrinks the viewport below one row", () => {
    const { state } = run(sessionOf(THREE_FILES), [{ type: "resize", rows: 2 }])
    expect(state.viewportHeight).toBe(1)
  })

  it("stops reacting once quitting", () => {
    const { state: quitting } = run(sessionOf(THREE_FILES), [{ type: "quit" }])
    expect(quitting.quitting).toBe(true)
    const { state, calls } = run(quitting, [{ type: "down" }, { type: "toggle" }])
    expect(state).toBe(quitting)
    expect(calls).toEqual([])
  })
})
