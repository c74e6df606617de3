import type { Key } from "ink"
import type { StagerEvent } from "./events.js"

export type KeyState = Pick<Key, "upArrow" | "downArrow" | "pageUp" | "pageDown" | "ctrl">

const CHARACTER_BINDINGS: Readonly<Record<string, StagerEvent>> = {
  " ": { type: "toggle" },
  d: { type: "toggleDiff" },
  g: { type: "top" },
  G: { type: "bottom" },
  q: { type: "quit" },
}

const hasBinding = (input: string): boolean => Object.prototype.hasOwnProperty.call(CHARACTER_BINDINGS, input)

export const resolveKeyEvent = (input: string, key: KeyState): StagerEvent | null => {
  if (key.ctrl) {
    return input === "c" || input === "\u0003" ? { type: "quit" } : null
  }
  if (key.upArrow) return { type: "up" }
  if (key.downArrow) return { type: "down" }
  if (key.pageUp) return { type: "pageUp" }
  if (key.pageDown) return { type: "pageDown" }
  if (input === "\u0003") return { type: "quit" }
  return hasBinding(input) ? CHARACTER_BINDINGS[input] : null
}
