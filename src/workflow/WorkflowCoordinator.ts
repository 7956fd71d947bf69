import { resolveLimits } from "../core/Config.js"
import {
    CancelledError,
    CritiqueError,
    FoundryError,
    InvalidTopicError,
    PolicyError,
    ResearchError,
    toError,
    WorkflowError,
    WritingError,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import { ProgressPublisher } from "../events/ProgressPublisher.js"
import { UsageAggregator } from "../metrics/UsageAggregator.js"
import type {
    AgentName,
    AgentStatus,
    Draft,
    ExecutorRole,
    Feedback,
    ResearchFallback,
    ResearchFinding,
    ResearchResult,
    RevisionDecision,
    RevisionLimits,
    StageContext,
    StageExecutors,
    UsageMetrics,
    WorkflowStage,
    WorkflowStatus,
} from "../types.js"
import { formatFeedbackForRevision } from "./feedback.js"
import { estimatePercent } from "./progress.js"
import { decideRevision } from "./RevisionPolicy.js"
import { runStage, type StageOutcome } from "./StageRunner.js"

export interface StageEntry {
    stage: WorkflowStage
    enteredAt: number
}

export interface WorkflowResult {
    status: WorkflowStatus
    topic: string
    /** Last draft produced; null only when no draft was ever written. */
    draft: Draft | null
    research: ResearchResult | null
    /** Completed revision cycles. */
    iterations: number
    elapsedMs: number
    /** Score of the last critique, null when none ran. */
    qualityScore: number | null
    /** The iteration budget ran out before the draft was accepted on merit. */
    bestEffort: boolean
    degradedResearch: boolean
    lastFeedback: Feedback | null
    decision: RevisionDecision | null
    metrics: Readonly<UsageMetrics>
    /** Every draft in order, when retention is enabled. */
    drafts: Draft[]
    stageHistory: StageEntry[]
    error?: WorkflowError
}

export interface WorkflowCoordinatorOptions {
    publisher?: ProgressPublisher
    aggregator?: UsageAggregator
    signal?: AbortSignal
    /** Degraded mode: supplies research data when the research stage fails. */
    researchFallback?: ResearchFallback
    retainDrafts?: boolean
    onDraft?: (draft: Draft, iteration: number) => void | Promise<void>
}

interface WorkflowState {
    stage: WorkflowStage
    iteration: number
    startedAt: number
    percent: number
    history: StageEntry[]
    research: ResearchResult | null
    degradedResearch: boolean
    draft: Draft | null
    drafts: Draft[]
    feedback: Feedback | null
    decision: RevisionDecision | null
}

const AGENT_TITLES: Record<AgentName, string> = {
    research: "Research",
    writing: "Writing",
    critique: "Critique",
    orchestrator: "Orchestrator",
}

/**
 * The research → write → critique → revise state machine. One instance
 * owns one workflow: its state, its metrics and its progress stream,
 * which is closed when the workflow reaches a terminal stage.
 */
export class WorkflowCoordinator {
    private readonly publisher: ProgressPublisher
    private readonly aggregator: UsageAggregator
    private readonly signal?: AbortSignal
    private readonly researchFallback?: ResearchFallback
    private readonly retainDrafts: boolean
    private readonly onDraft?: WorkflowCoordinatorOptions["onDraft"]
    private state: WorkflowState | null = null
    private topic = ""

    constructor(options: WorkflowCoordinatorOptions = {}) {
        this.publisher = options.publisher ?? new ProgressPublisher()
        this.aggregator = options.aggregator ?? new UsageAggregator()
        this.signal = options.signal
        this.researchFallback = options.researchFallback
        this.retainDrafts = options.retainDrafts ?? false
        this.onDraft = options.onDraft
    }

    /**
     * Run the workflow to a terminal stage. Stage failures and
     * cancellation come back as a failed result carrying the partial
     * state; only invalid input throws.
     */
    public async run(
        topic: string,
        executors: StageExecutors,
        limits?: Partial<RevisionLimits>
    ): Promise<WorkflowResult> {
        if (this.state) {
            throw new WorkflowError(
                "A coordinator runs a single workflow",
                undefined,
                {},
                "COORDINATOR_REUSED"
            )
        }
        let resolved: RevisionLimits
        const trimmed = topic.trim()
        try {
            if (!trimmed) throw new InvalidTopicError(topic)
            resolved = resolveLimits(limits)
        } catch (error) {
            this.publisher.close()
            throw error
        }

        this.topic = trimmed
        const startedAt = Date.now()
        const state: WorkflowState = {
            stage: "initializing",
            iteration: 0,
            startedAt,
            percent: 0,
            history: [],
            research: null,
            degradedResearch: false,
            draft: null,
            drafts: [],
            feedback: null,
            decision: null,
        }
        this.state = state

        try {
            this.enter(state, "initializing", `Starting workflow for "${trimmed}"`, {
                topic: trimmed,
                maxIterations: resolved.maxIterations,
                qualityThreshold: resolved.qualityThreshold,
            })
            return await this.execute(state, executors, resolved)
        } catch (error) {
            const err = toError(error)
            log.workflow("Unexpected workflow failure: %s", err.message)
            return this.fail(
                state,
                err instanceof WorkflowError
                    ? err
                    : new WorkflowError(`Workflow failed: ${err.message}`, err)
            )
        } finally {
            this.publisher.close()
        }
    }

    private async execute(
        state: WorkflowState,
        executors: StageExecutors,
        limits: RevisionLimits
    ): Promise<WorkflowResult> {
        const topic = this.topic

        this.enter(state, "researching", "Gathering research")
        const researched = await this.invoke(
            state,
            "research",
            limits,
            (ctx) => executors.research.run(topic, ctx)
        )
        let research: ResearchResult
        if (researched.ok) {
            research = researched.value
        } else {
            if (researched.error instanceof CancelledError) {
                return this.fail(state, researched.error)
            }
            const fallback = this.researchFallback?.(topic, researched.error)
            if (!fallback) {
                return this.fail(
                    state,
                    new ResearchError(
                        `Research failed: ${researched.error.message}`,
                        researched.error,
                        findPartialFindings(researched.error)
                    )
                )
            }
            log.workflow("Research failed, continuing with fallback data")
            research = fallback
            state.degradedResearch = true
            this.emit(state, "research", "error", "Research failed; continuing with fallback data", {
                degraded: true,
                error: researched.error.message,
            })
        }
        state.research = research

        if (this.signal?.aborted) return this.cancel(state)
        this.enter(state, "writing", "Writing the initial draft", {
            findings: research.findings.length,
            confidence: research.confidence,
        })
        const written = await this.invoke(state, "writing", limits, (ctx) =>
            executors.writing.run(topic, research, undefined, undefined, ctx)
        )
        if (!written.ok) {
            return this.fail(state, stageFailure("writing", written.error, 0))
        }
        let draft = written.value
        await this.adopt(state, draft)

        for (let cycle = 0; cycle < limits.maxIterations; cycle++) {
            if (this.signal?.aborted) return this.cancel(state)
            this.enter(state, "critiquing", `Reviewing draft ${state.iteration + 1}`, {
                iteration: state.iteration,
                wordCount: draft.wordCount,
            })
            const current = draft
            const critiqued = await this.invoke(state, "critique", limits, (ctx) =>
                executors.critique.run(current, research, ctx)
            )
            if (!critiqued.ok) {
                return this.fail(
                    state,
                    stageFailure("critique", critiqued.error, state.iteration)
                )
            }
            const feedback = critiqued.value
            state.feedback = feedback

            const decision = decideRevision(feedback, state.iteration, limits)
            state.decision = decision
            log.workflow(
                "Iteration %d: quality %s → %s (%s)",
                state.iteration,
                feedback.overallQuality,
                decision.action,
                decision.reason
            )
            this.emit(state, "orchestrator", "working", `Decision: ${decision.action} (${decision.detail})`, {
                decision: decision.action,
                reason: decision.reason,
                quality: feedback.overallQuality,
                iteration: state.iteration,
            })

            if (decision.action === "accept") return this.complete(state, limits)
            if (decision.action === "abandon") {
                return this.fail(state, new PolicyError(decision.detail, state.iteration))
            }

            if (this.signal?.aborted) return this.cancel(state)
            this.enter(state, "revising", `Revising draft (cycle ${state.iteration + 1})`, {
                iteration: state.iteration,
                feedbackItems: feedback.items.length,
            })
            const instructions = formatFeedbackForRevision(feedback)
            const revised = await this.invoke(
                state,
                "writing",
                limits,
                (ctx) =>
                    executors.writing.run(topic, research, current, instructions, ctx),
                true
            )
            if (!revised.ok) {
                return this.fail(
                    state,
                    stageFailure("writing", revised.error, state.iteration)
                )
            }
            draft = revised.value
            state.iteration += 1
            this.aggregator.setIteration(state.iteration)
            await this.adopt(state, draft)
        }

        return this.complete(state, limits)
    }

    private async invoke<T>(
        state: WorkflowState,
        role: ExecutorRole,
        limits: RevisionLimits,
        call: (context: StageContext) => Promise<T>,
        revision = false
    ): Promise<StageOutcome<T>> {
        const title = AGENT_TITLES[role]
        this.emit(state, role, "working", `${title} Agent: working`)
        const outcome = await runStage(call, {
            role,
            stage: state.stage,
            timeoutMs: limits.stageTimeoutMs,
            maxRetries: limits.maxRetries,
            baseDelayMs: limits.baseDelayMs,
            maxDelayMs: limits.maxDelayMs,
            signal: this.signal,
            onRetry: (notice) =>
                this.emit(
                    state,
                    role,
                    "working",
                    `${title} Agent: retry ${notice.attempt}/${notice.maxRetries} in ${notice.delayMs}ms`,
                    { retry: notice.attempt, reason: notice.error.message }
                ),
        })

        this.aggregator.record({
            role,
            outcome: outcome.ok ? "success" : "failure",
            durationMs: outcome.durationMs,
            attempts: outcome.attempts,
            costUnits: outcome.costUnits,
            tokens: outcome.tokens,
            revision,
        })

        if (outcome.ok) {
            this.emit(state, role, "completed", `${title} Agent: completed`, {
                durationMs: outcome.durationMs,
                attempts: outcome.attempts,
                costUnits: outcome.costUnits,
            })
        } else {
            this.emit(state, role, "error", `${title} Agent: ${outcome.error.message}`, {
                code: outcome.error.code,
                attempts: outcome.attempts,
            })
        }
        return outcome
    }

    private async adopt(state: WorkflowState, draft: Draft): Promise<void> {
        state.draft = draft
        if (this.retainDrafts) state.drafts.push(draft)
        if (!this.onDraft) return
        try {
            await this.onDraft(draft, state.iteration)
        } catch (error) {
            log.workflow("Draft hook failed: %s", toError(error).message)
        }
    }

    private complete(
        state: WorkflowState,
        limits: RevisionLimits
    ): WorkflowResult {
        const feedback = state.feedback
        const bestEffort =
            state.decision?.reason === "budget_exhausted" &&
            feedback !== null &&
            feedback.approval !== "approved" &&
            feedback.overallQuality < limits.qualityThreshold
        this.enter(state, "finalizing", "Finalizing the document", {
            bestEffort,
        })
        this.enter(state, "completed", "Workflow completed", {
            iterations: state.iteration,
            quality: feedback?.overallQuality,
            bestEffort,
        })
        return this.buildResult(state, "completed", bestEffort)
    }

    private cancel(state: WorkflowState): WorkflowResult {
        return this.fail(state, new CancelledError(state.stage))
    }

    private fail(state: WorkflowState, error: WorkflowError): WorkflowResult {
        log.workflow("Workflow failed in %s: %s", state.stage, error.message)
        this.enter(state, "failed", error.message, { code: error.code }, "error")
        return this.buildResult(state, "failed", false, error)
    }

    private enter(
        state: WorkflowState,
        stage: WorkflowStage,
        message: string,
        metadata?: Record<string, unknown>,
        status: AgentStatus = stage === "completed" ? "completed" : "working"
    ): void {
        const now = Date.now()
        state.stage = stage
        state.history.push({ stage, enteredAt: now })
        state.percent = estimatePercent(stage, state.iteration, state.percent)
        log.workflow("→ %s: %s", stage, message)
        this.emit(state, "orchestrator", status, message, metadata)
    }

    private emit(
        state: WorkflowState,
        agent: AgentName,
        status: AgentStatus,
        message: string,
        metadata?: Record<string, unknown>
    ): void {
        this.publisher.publish({
            timestamp: Date.now(),
            stage: state.stage,
            agent,
            status,
            message,
            percent: state.percent,
            metadata,
        })
    }

    private buildResult(
        state: WorkflowState,
        status: WorkflowStatus,
        bestEffort: boolean,
        error?: WorkflowError
    ): WorkflowResult {
        return {
            status,
            topic: this.topic,
            draft: state.draft,
            research: state.research,
            iterations: state.iteration,
            elapsedMs: Date.now() - state.startedAt,
            qualityScore: state.feedback?.overallQuality ?? null,
            bestEffort,
            degradedResearch: state.degradedResearch,
            lastFeedback: state.feedback,
            decision: state.decision,
            metrics: this.aggregator.snapshot(),
            drafts: [...state.drafts],
            stageHistory: [...state.history],
            error,
        }
    }
}

function stageFailure(
    role: "writing" | "critique",
    error: FoundryError,
    iteration: number
): WorkflowError {
    if (error instanceof CancelledError) return error
    const message = `${AGENT_TITLES[role]} failed: ${error.message}`
    return role === "writing"
        ? new WritingError(message, iteration, error)
        : new CritiqueError(message, iteration, error)
}

function findPartialFindings(error: Error | undefined): ResearchFinding[] {
    let current = error
    while (current) {
        if (current instanceof ResearchError) return current.partialFindings
        current = current.cause instanceof Error ? current.cause : undefined
    }
    return []
}
