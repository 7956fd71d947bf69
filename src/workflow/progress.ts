import type { WorkflowStage } from "../types.js"

const STAGE_PERCENT: Record<Exclude<WorkflowStage, "failed">, number> = {
    initializing: 5,
    researching: 20,
    writing: 40,
    critiquing: 60,
    revising: 80,
    finalizing: 95,
    completed: 100,
}

/**
 * Rough overall completion for a stage. Revisions creep toward 95 as
 * cycles accumulate; a failed workflow stays where it stopped.
 */
export function estimatePercent(
    stage: WorkflowStage,
    iteration: number,
    previous: number
): number {
    if (stage === "failed") return previous
    const base = STAGE_PERCENT[stage]
    if (stage === "revising" && iteration > 0) {
        return Math.min(base + Math.min(iteration * 10, 30), 95)
    }
    return base
}
