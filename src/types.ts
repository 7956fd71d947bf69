export type ExecutorRole = "research" | "writing" | "critique"

export type AgentName = ExecutorRole | "orchestrator"

export type LLMProviderType = "openai" | "anthropic"

export type WorkflowStage =
    | "initializing"
    | "researching"
    | "writing"
    | "critiquing"
    | "revising"
    | "finalizing"
    | "completed"
    | "failed"

export type AgentStatus = "idle" | "working" | "completed" | "error"

export type WorkflowStatus = "completed" | "failed"

export type FeedbackSeverity = "minor" | "moderate" | "major"

export type ApprovalStatus = "approved" | "needs_revision"

export interface ResearchFinding {
    fact: string
    sourceUrl: string
    /** Relevance to the topic in [0, 1]. */
    relevanceScore: number
    /** e.g. statistic, study, expert_opinion */
    category: string
}

export interface ResearchResult {
    topic: string
    findings: ResearchFinding[]
    summary: string
    /** Confidence in the research quality, in [0, 1]. */
    confidence: number
}

export interface Draft {
    title: string
    introduction: string
    bodySections: string[]
    conclusion: string
    wordCount: number
}

export interface FeedbackItem {
    section: string
    issue: string
    suggestion: string
    severity: FeedbackSeverity
}

export interface Feedback {
    /** Overall quality score in [0, 10]. */
    overallQuality: number
    items: FeedbackItem[]
    approval: ApprovalStatus
    summary: string
}

export type SeverityWeights = Record<FeedbackSeverity, number>

export interface RevisionLimits {
    maxIterations: number
    qualityThreshold: number
    stageTimeoutMs: number
    maxRetries: number
    baseDelayMs: number
    maxDelayMs: number
    /** Gap below the threshold that still justifies another cycle. */
    reviseMargin: number
    severityWeights: SeverityWeights
    severityReviseThreshold: number
}

export type RevisionAction = "accept" | "revise" | "abandon"

export type DecisionReason =
    | "unusable_feedback"
    | "budget_exhausted"
    | "approved"
    | "threshold_met"
    | "major_issues"
    | "below_margin"
    | "within_margin"

export interface RevisionDecision {
    action: RevisionAction
    reason: DecisionReason
    detail: string
}

export interface TokenUsage {
    promptTokens: number
    completionTokens: number
    totalTokens: number
}

export interface StageContext {
    signal: AbortSignal
    /** 0-based attempt number within the stage's retry budget. */
    attempt: number
    reportUsage(costUnits: number, tokens?: TokenUsage): void
}

export interface ResearchExecutor {
    run(topic: string, context?: StageContext): Promise<ResearchResult>
}

export interface WritingExecutor {
    run(
        topic: string,
        research: ResearchResult,
        priorDraft?: Draft,
        feedback?: string,
        context?: StageContext
    ): Promise<Draft>
}

export interface CritiqueExecutor {
    run(
        draft: Draft,
        research: ResearchResult,
        context?: StageContext
    ): Promise<Feedback>
}

export interface StageExecutors {
    research: ResearchExecutor
    writing: WritingExecutor
    critique: CritiqueExecutor
}

export type ResearchFallback = (
    topic: string,
    error: Error
) => ResearchResult | undefined

export interface StageMetrics {
    calls: number
    failures: number
    retries: number
    elapsedMs: number
}

export interface UsageMetrics {
    stages: Record<ExecutorRole, StageMetrics>
    costUnits: number
    tokens: TokenUsage
    iteration: number
    revisionCount: number
}

export interface ModelConfig {
    provider: LLMProviderType
    model: string
    temperature?: number
    maxTokens?: number
}

export interface LLMMessage {
    role: "system" | "user" | "assistant"
    content: string
}

export interface LLMResponse {
    content: string
    usage: TokenUsage
}

export interface LLMProvider {
    chat(
        messages: LLMMessage[],
        model: ModelConfig,
        signal?: AbortSignal
    ): Promise<LLMResponse>
}

export type RendererType = "terminal" | "log" | "none"

export interface FoundryConfig {
    openaiApiKey?: string
    anthropicApiKey?: string
    workingDirectory: string
    persistencePath?: string
    defaultProvider?: LLMProviderType
    defaultModel?: string
    criticModel?: string
    renderer?: RendererType
    verbose?: boolean
    limits?: Partial<RevisionLimits>
    degradedResearch?: boolean
    retainDrafts?: boolean
    budgetCostUnits?: number
    providers?: Partial<Record<LLMProviderType, LLMProvider>>
    executors?: Partial<StageExecutors>
}
