import { formatCost } from "../core/Pricing.js"
import type { ProgressPublisher } from "../events/ProgressPublisher.js"
import type { ProgressEvent, ProgressHandler } from "../events/types.js"
import { getAgentLabel } from "./agentLabels.js"
import { formatElapsed, metadataNumber, truncate } from "./format.js"
import type { CreateRendererOptions, Renderer } from "./types.js"

export function formatProgressLine(event: ProgressEvent): string {
    const percent = `${String(Math.round(event.percent)).padStart(3)}%`
    const agent = getAgentLabel(event.agent).padEnd(11)
    const stage = event.stage.padEnd(12)
    const cost = metadataNumber(event, "costUnits")
    const suffix =
        event.status === "completed" && cost !== undefined && cost > 0
            ? `  ${formatCost(cost)}`
            : ""
    return `${percent}  ${stage}  ${agent}  ${event.status.padEnd(9)}  ${truncate(event.message, 80)}${suffix}`
}

/** Plain line-per-event output, for CI logs and non-TTY runs. */
export class LogRenderer implements Renderer {
    private readonly write: (line: string) => void
    private publisher: ProgressPublisher | null = null
    private handler: ProgressHandler | null = null
    private startedAt = 0

    constructor(options?: CreateRendererOptions) {
        this.write =
            options?.write ?? ((line) => process.stdout.write(`${line}\n`))
    }

    public attach(publisher: ProgressPublisher): void {
        this.publisher = publisher
        this.handler = (event: ProgressEvent): void => this.handleEvent(event)
        publisher.on(this.handler)
        publisher.onClose(() => this.detach())
    }

    public detach(): void {
        if (this.publisher && this.handler) {
            this.publisher.off(this.handler)
        }
        this.publisher = null
        this.handler = null
    }

    private handleEvent(event: ProgressEvent): void {
        if (!this.startedAt) this.startedAt = event.timestamp
        const elapsed = formatElapsed(event.timestamp - this.startedAt)
        this.write(`[${elapsed}] ${formatProgressLine(event)}`)
    }
}
