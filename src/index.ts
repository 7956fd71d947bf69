import {
    Orchestrator,
    type GenerateOptions,
    type RunResult,
} from "./orchestrator/Orchestrator.js"
import type { FoundryConfig, RevisionLimits } from "./types.js"

export class DraftFoundry {
    private readonly orchestrator: Orchestrator

    constructor(config: FoundryConfig) {
        this.orchestrator = new Orchestrator(config)
    }

    /**
     * Research, draft and refine an article on `topic`. Stage failures
     * come back as a failed result; an empty topic or invalid limits throw.
     */
    public async generate(
        topic: string,
        limits?: Partial<RevisionLimits>,
        options?: GenerateOptions
    ): Promise<RunResult> {
        return this.orchestrator.generate(topic, limits, options)
    }

    public abort(): void {
        this.orchestrator.abort()
    }
}

export {
    createLLMExecutors,
    CritiqueAgent,
    minimalResearchFallback,
    ResearchAgent,
    WritingAgent,
} from "./agents/index.js"
export { DEFAULT_LIMITS, resolveLimits } from "./core/Config.js"
export * from "./core/errors.js"
export { ProgressPublisher, ProgressSubscription } from "./events/ProgressPublisher.js"
export type { ProgressEvent, ProgressHandler } from "./events/types.js"
export { createLLMProvider } from "./llm/index.js"
export { UsageAggregator } from "./metrics/UsageAggregator.js"
export type { GenerateOptions, RunResult } from "./orchestrator/Orchestrator.js"
export { renderDraftMarkdown } from "./output/markdown.js"
export { decideRevision } from "./workflow/RevisionPolicy.js"
export { runStage } from "./workflow/StageRunner.js"
export {
    WorkflowCoordinator,
    type WorkflowCoordinatorOptions,
    type WorkflowResult,
} from "./workflow/WorkflowCoordinator.js"
export type {
    CritiqueExecutor,
    Draft,
    Feedback,
    FeedbackItem,
    FoundryConfig,
    LLMProvider,
    ResearchExecutor,
    ResearchFinding,
    ResearchResult,
    RevisionDecision,
    RevisionLimits,
    StageContext,
    StageExecutors,
    UsageMetrics,
    WorkflowStage,
    WritingExecutor,
} from "./types.js"
