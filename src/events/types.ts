import type { AgentName, AgentStatus, WorkflowStage } from "../types.js"

export interface ProgressEvent {
    /** Epoch milliseconds. */
    timestamp: number
    stage: WorkflowStage
    agent: AgentName
    status: AgentStatus
    message: string
    /** Estimated overall completion in [0, 100]. */
    percent: number
    metadata?: Record<string, unknown>
}

export type ProgressHandler = (event: ProgressEvent) => void
