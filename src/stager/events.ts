export type StagerEvent =
  | { readonly type: "quit" }
  | { readonly type: "up" }
  | { readonly type: "down" }
  | { readonly type: "pageUp" }
  | { readonly type: "pageDown" }
  | { readonly type: "toggle" }
  | { readonly type: "toggleDiff" }
  | { readonly type: "top" }
  | { readonly type: "bottom" }
  | { readonly type: "resize"; readonly rows: number }
