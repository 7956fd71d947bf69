import type { ProgressPublisher } from "../events/ProgressPublisher.js"

export interface CreateRendererOptions {
    verbose?: boolean
    /** Line sink; defaults to stdout. */
    write?: (line: string) => void
}

/**
 * Renderers observe a single run's progress stream. They detach on
 * their own when the publisher closes.
 */
export interface Renderer {
    attach(publisher: ProgressPublisher): void
    detach(): void
}
