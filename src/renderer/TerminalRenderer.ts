import chalk from "chalk"
import logUpdate from "log-update"

import { formatCost } from "../core/Pricing.js"
import type { ProgressPublisher } from "../events/ProgressPublisher.js"
import type { ProgressEvent, ProgressHandler } from "../events/types.js"
import type {
    AgentStatus,
    ExecutorRole,
    WorkflowStage,
} from "../types.js"
import { AGENT_LABELS } from "./agentLabels.js"
import { formatDuration, metadataNumber, truncate } from "./format.js"
import type { CreateRendererOptions, Renderer } from "./types.js"

const STATUS_GLYPHS: Record<AgentStatus, string> = {
    idle: chalk.dim("·"),
    working: chalk.blue("⟳"),
    completed: chalk.green("✓"),
    error: chalk.red("✗"),
}

const ROLES: readonly ExecutorRole[] = ["research", "writing", "critique"]

const BAR_WIDTH = 24
const MAX_RECENT = 6

interface AgentRow {
    status: AgentStatus
    startedAt?: number
    completedAt?: number
    costUnits: number
    calls: number
    retry?: number
}

/** Live view of one run: stage, progress bar, one row per agent. */
export class TerminalRenderer implements Renderer {
    private readonly verbose: boolean
    private publisher: ProgressPublisher | null = null
    private handler: ProgressHandler | null = null
    private tickInterval: ReturnType<typeof setInterval> | null = null
    private rows: Record<ExecutorRole, AgentRow> = {
        research: emptyRow(),
        writing: emptyRow(),
        critique: emptyRow(),
    }
    private topic = ""
    private stage: WorkflowStage = "initializing"
    private percent = 0
    private iteration = 0
    private headline = ""
    private recent: string[] = []
    private startedAt = 0
    private lastRenderedOutput = ""

    constructor(options?: CreateRendererOptions) {
        this.verbose = options?.verbose ?? false
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
        this.stopTick()
        if (this.lastRenderedOutput) logUpdate.done()
        this.publisher = null
        this.handler = null
    }

    private startTick(): void {
        if (this.tickInterval) return
        this.tickInterval = setInterval(() => this.render(), 1000)
        this.tickInterval.unref()
    }

    private stopTick(): void {
        if (this.tickInterval) {
            clearInterval(this.tickInterval)
            this.tickInterval = null
        }
    }

    private handleEvent(event: ProgressEvent): void {
        this.stage = event.stage
        this.percent = event.percent

        if (event.agent === "orchestrator") {
            this.onOrchestratorEvent(event)
        } else {
            this.onAgentEvent(event.agent, event)
        }

        this.recent.push(
            `${AGENT_LABELS[event.agent]}: ${truncate(event.message, 72)}`
        )
        if (this.recent.length > MAX_RECENT) this.recent.shift()

        if (event.stage === "completed" || event.stage === "failed") {
            this.stopTick()
        }
        this.render()
    }

    private onOrchestratorEvent(event: ProgressEvent): void {
        if (event.stage === "initializing") {
            const topic = event.metadata?.topic
            if (typeof topic === "string") this.topic = topic
            this.startedAt = event.timestamp
            this.startTick()
        }
        this.iteration = metadataNumber(event, "iteration") ?? this.iteration
        this.headline = event.message
    }

    private onAgentEvent(role: ExecutorRole, event: ProgressEvent): void {
        const row = this.rows[role]
        switch (event.status) {
            case "working": {
                const retry = metadataNumber(event, "retry")
                if (retry !== undefined) {
                    row.retry = retry
                    break
                }
                row.status = "working"
                row.startedAt = event.timestamp
                row.completedAt = undefined
                row.retry = undefined
                row.calls++
                break
            }
            case "completed":
                row.status = "completed"
                row.completedAt = event.timestamp
                row.costUnits += metadataNumber(event, "costUnits") ?? 0
                row.retry = undefined
                break
            case "error":
                row.status = "error"
                row.completedAt = event.timestamp
                break
            case "idle":
                row.status = "idle"
                break
        }
    }

    private render(): void {
        const lines: string[] = []
        lines.push(
            `${chalk.bold.cyan("draft-foundry")}  ${chalk.dim(this.topic)}`
        )
        lines.push(chalk.dim("│"))

        const filled = Math.round((this.percent / 100) * BAR_WIDTH)
        const bar =
            chalk.cyan("█".repeat(filled)) +
            chalk.dim("░".repeat(BAR_WIDTH - filled))
        const elapsed = this.startedAt
            ? chalk.dim(formatDuration(Date.now() - this.startedAt))
            : ""
        lines.push(
            [
                chalk.dim("├─"),
                bar,
                `${String(Math.round(this.percent)).padStart(3)}%`,
                chalk.bold(this.stage),
                chalk.dim(`cycle ${this.iteration + 1}`),
                elapsed,
            ]
                .filter(Boolean)
                .join("  ")
        )
        lines.push(chalk.dim("│"))

        for (const role of ROLES) {
            lines.push(this.renderRow(role))
        }

        if (this.headline) {
            lines.push(chalk.dim("│"))
            lines.push(`${chalk.dim("├─")} ${this.headline}`)
        }

        if (this.verbose && this.recent.length > 0) {
            lines.push(chalk.dim("│"))
            for (const entry of this.recent) {
                lines.push(chalk.dim(`│  ${entry}`))
            }
        }

        const totalCost = ROLES.reduce(
            (sum, role) => sum + this.rows[role].costUnits,
            0
        )
        lines.push(chalk.dim("│"))
        lines.push(chalk.dim(`├─ Cost: ${formatCost(totalCost)}`))

        if (this.stage === "completed") {
            lines.push(chalk.green("╰─ Draft ready"))
        } else if (this.stage === "failed") {
            lines.push(chalk.red("╰─ Workflow failed"))
        }

        const output = lines.join("\n")
        if (output === this.lastRenderedOutput) return
        this.lastRenderedOutput = output
        logUpdate(output)
    }

    private renderRow(role: ExecutorRole): string {
        const row = this.rows[role]
        const label = AGENT_LABELS[role].padEnd(11)
        const parts = [
            chalk.dim("├─"),
            STATUS_GLYPHS[row.status],
            row.status === "working" ? chalk.bold(label) : label,
            chalk.dim(row.status.padEnd(9)),
        ]
        if (row.startedAt) {
            const end = row.completedAt ?? Date.now()
            parts.push(chalk.dim(formatDuration(end - row.startedAt)))
        }
        if (row.calls > 1) parts.push(chalk.dim(`×${row.calls}`))
        if (row.costUnits > 0) parts.push(chalk.dim(formatCost(row.costUnits)))
        if (row.retry !== undefined) {
            parts.push(chalk.yellow(`retry ${row.retry}`))
        }
        return parts.join("  ")
    }
}

function emptyRow(): AgentRow {
    return { status: "idle", costUnits: 0, calls: 0 }
}
