import type {
    ExecutorRole,
    StageMetrics,
    TokenUsage,
    UsageMetrics,
} from "../types.js"

export interface StageInvocation {
    role: ExecutorRole
    outcome: "success" | "failure"
    durationMs: number
    /** Attempts made, including the successful or final one. */
    attempts: number
    costUnits: number
    tokens?: TokenUsage
    /** A writing call that revises an earlier draft. */
    revision?: boolean
}

function emptyStage(): StageMetrics {
    return { calls: 0, failures: 0, retries: 0, elapsedMs: 0 }
}

function emptyTokens(): TokenUsage {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0 }
}

/**
 * Running totals for one workflow. Every update replaces the state
 * object in a single assignment, so a snapshot never observes half of a
 * recorded invocation.
 */
export class UsageAggregator {
    private state: UsageMetrics = {
        stages: {
            research: emptyStage(),
            writing: emptyStage(),
            critique: emptyStage(),
        },
        costUnits: 0,
        tokens: emptyTokens(),
        iteration: 0,
        revisionCount: 0,
    }

    public record(invocation: StageInvocation): void {
        const current = this.state
        const stage = current.stages[invocation.role]
        const tokens = invocation.tokens ?? emptyTokens()
        this.state = {
            ...current,
            stages: {
                ...current.stages,
                [invocation.role]: {
                    calls: stage.calls + 1,
                    failures:
                        stage.failures +
                        (invocation.outcome === "failure" ? 1 : 0),
                    retries: stage.retries + Math.max(0, invocation.attempts - 1),
                    elapsedMs: stage.elapsedMs + invocation.durationMs,
                },
            },
            costUnits: current.costUnits + invocation.costUnits,
            tokens: {
                promptTokens: current.tokens.promptTokens + tokens.promptTokens,
                completionTokens:
                    current.tokens.completionTokens + tokens.completionTokens,
                totalTokens: current.tokens.totalTokens + tokens.totalTokens,
            },
            revisionCount:
                current.revisionCount + (invocation.revision ? 1 : 0),
        }
    }

    public setIteration(iteration: number): void {
        this.state = { ...this.state, iteration }
    }

    public get costUnits(): number {
        return this.state.costUnits
    }

    public snapshot(): Readonly<UsageMetrics> {
        const { stages, tokens } = this.state
        return Object.freeze({
            ...this.state,
            stages: Object.freeze({
                research: Object.freeze({ ...stages.research }),
                writing: Object.freeze({ ...stages.writing }),
                critique: Object.freeze({ ...stages.critique }),
            }),
            tokens: Object.freeze({ ...tokens }),
        })
    }
}
