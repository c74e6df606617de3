import React, { useCallback, useEffect, useRef, useState } from "react"
import { Text, useApp, useInput, useStdout } from "ink"
import type { GitRunner } from "../git/types.js"
import { renderFrame } from "../render/renderFrame.js"
import type { RenderTheme } from "../render/theme.js"
import type { StagerEvent } from "../stager/events.js"
import { resolveKeyEvent } from "../stager/keymap.js"
import { processEvent } from "../stager/reducer.js"
import type { SessionState } from "../stager/state.js"
import { noopLogger, type DebugLogger } from "../util/debugLog.js"

export interface StagerViewProps {
  readonly initialState: SessionState
  readonly git: GitRunner
  readonly theme: RenderTheme
  readonly log?: DebugLogger
  readonly onStateChange?: (state: SessionState) => void
}

export const StagerView: React.FC<StagerViewProps> = ({ initialState, git, theme, log = noopLogger, onStateChange }) => {
  const { exit } = useApp()
  const { stdout } = useStdout()
  const [state, setState] = useState(initialState)
  const stateRef = useRef(initialState)

  const dispatch = useCallback(
    (event: StagerEvent) => {
      const next = processEvent(stateRef.current, event, { git, log })
      if (next === stateRef.current) return
      stateRef.current = next
      setState(next)
      onStateChange?.(next)
      if (next.quitting) exit()
    },
    [git, log, exit, onStateChange],
  )

  useInput((input, key) => {
    const event = resolveKeyEvent(input, key)
    if (event) dispatch(event)
  })

  useEffect(() => {
    const handleResize = () => {
      if (typeof stdout.rows === "number") dispatch({ type: "resize", rows: stdout.rows })
    }
    stdout.on("resize", handleResize)
    return () => {
      stdout.off("resize", handleResize)
    }
  }, [stdout, dispatch])

  return <Text>{renderFrame(state, theme)}</Text>
}
