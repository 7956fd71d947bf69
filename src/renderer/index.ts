import type { RendererType } from "../types.js"
import { LogRenderer } from "./LogRenderer.js"
import { TerminalRenderer } from "./TerminalRenderer.js"
import type { CreateRendererOptions, Renderer } from "./types.js"

export function createRenderer(
    type: RendererType,
    options?: CreateRendererOptions
): Renderer | null {
    switch (type) {
        case "terminal":
            return new TerminalRenderer(options)
        case "log":
            return new LogRenderer(options)
        case "none":
            return null
    }
}

export { formatProgressLine, LogRenderer } from "./LogRenderer.js"
export { TerminalRenderer } from "./TerminalRenderer.js"
export type { CreateRendererOptions, Renderer } from "./types.js"
