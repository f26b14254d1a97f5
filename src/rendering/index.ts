import { InteractiveRenderer } from "./interactive.js"
import { PlainRenderer } from "./plain.js"
import type { CliRenderer } from "./types.js"

export * from "./types.js"

export type RendererMode = "interactive" | "plain"

export const createRenderer = (mode: RendererMode): CliRenderer => {
  if (mode === "plain") {
    return new PlainRenderer()
  }
  return new InteractiveRenderer()
}
