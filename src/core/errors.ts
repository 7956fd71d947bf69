import type { ExecutorRole, ResearchFinding, WorkflowStage } from "../types.js"

export class FoundryError extends Error {
    public readonly code: string
    public override readonly cause?: Error
    public readonly context: Record<string, unknown>

    constructor(
        message: string,
        code: string,
        cause?: Error,
        context: Record<string, unknown> = {}
    ) {
        super(message)
        this.name = "FoundryError"
        this.code = code
        this.cause = cause
        this.context = context
    }

    public toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            context: this.context,
            cause: this.cause?.message,
        }
    }
}

/** Network, rate-limit or timeout trouble; eligible for backoff retry. */
export class RetryableError extends FoundryError {
    constructor(
        message: string,
        cause?: Error,
        context?: Record<string, unknown>,
        code = "RETRYABLE"
    ) {
        super(message, code, cause, context)
        this.name = "RetryableError"
    }
}

export class StageTimeoutError extends RetryableError {
    public readonly timeoutMs: number

    constructor(role: ExecutorRole, timeoutMs: number) {
        super(
            `${role} stage timed out after ${timeoutMs}ms`,
            undefined,
            { role, timeoutMs },
            "STAGE_TIMEOUT"
        )
        this.name = "StageTimeoutError"
        this.timeoutMs = timeoutMs
    }
}

/** Unusable output or a permanent failure; never retried. */
export class FatalError extends FoundryError {
    constructor(
        message: string,
        cause?: Error,
        context?: Record<string, unknown>,
        code = "FATAL"
    ) {
        super(message, code, cause, context)
        this.name = "FatalError"
    }
}

export class OutputValidationError extends FatalError {
    constructor(role: ExecutorRole, issues: string[]) {
        super(
            `${role} output failed validation: ${issues.join("; ")}`,
            undefined,
            { role, issues },
            "INVALID_OUTPUT"
        )
        this.name = "OutputValidationError"
    }
}

export class StageExhaustedError extends FatalError {
    public readonly attempts: number

    constructor(role: ExecutorRole, attempts: number, cause?: Error) {
        super(
            `${role} stage failed after ${attempts} attempt(s): ${cause?.message ?? "unknown error"}`,
            cause,
            { role, attempts },
            "RETRIES_EXHAUSTED"
        )
        this.name = "StageExhaustedError"
        this.attempts = attempts
    }
}

/**
 * An LLM SDK failure. Whether it is worth retrying depends on the HTTP
 * status or transport error the SDK reported.
 */
export class LLMError extends FoundryError {
    public readonly retryable: boolean
    public readonly status?: number

    constructor(
        message: string,
        retryable: boolean,
        status?: number,
        cause?: Error
    ) {
        super(message, "LLM_ERROR", cause, { status })
        this.name = "LLMError"
        this.retryable = retryable
        this.status = status
    }
}

export class WorkflowError extends FoundryError {
    constructor(
        message: string,
        cause?: Error,
        context?: Record<string, unknown>,
        code = "WORKFLOW_ERROR"
    ) {
        super(message, code, cause, context)
        this.name = "WorkflowError"
    }
}

export class InvalidTopicError extends WorkflowError {
    constructor(topic: string) {
        super("Topic cannot be empty", undefined, { topic }, "INVALID_TOPIC")
        this.name = "InvalidTopicError"
    }
}

export class InvalidLimitsError extends WorkflowError {
    constructor(issues: string[]) {
        super(
            `Invalid revision limits: ${issues.join("; ")}`,
            undefined,
            { issues },
            "INVALID_LIMITS"
        )
        this.name = "InvalidLimitsError"
    }
}

export class ResearchError extends WorkflowError {
    public readonly partialFindings: ResearchFinding[]

    constructor(
        message: string,
        cause?: Error,
        partialFindings: ResearchFinding[] = []
    ) {
        super(
            message,
            cause,
            { stage: "researching", partialFindings: partialFindings.length },
            "RESEARCH_FAILED"
        )
        this.name = "ResearchError"
        this.partialFindings = partialFindings
    }
}

export class WritingError extends WorkflowError {
    constructor(message: string, iteration: number, cause?: Error) {
        super(message, cause, { iteration }, "WRITING_FAILED")
        this.name = "WritingError"
    }
}

export class CritiqueError extends WorkflowError {
    constructor(message: string, iteration: number, cause?: Error) {
        super(message, cause, { iteration }, "CRITIQUE_FAILED")
        this.name = "CritiqueError"
    }
}

export class PolicyError extends WorkflowError {
    constructor(message: string, iteration: number) {
        super(message, undefined, { iteration }, "POLICY_ABANDONED")
        this.name = "PolicyError"
    }
}

export class CancelledError extends WorkflowError {
    constructor(stage: WorkflowStage) {
        super(`Workflow cancelled during ${stage}`, undefined, { stage }, "CANCELLED")
        this.name = "CancelledError"
    }
}

export class ConfigError extends FoundryError {
    constructor(message: string) {
        super(message, "CONFIG_ERROR")
        this.name = "ConfigError"
    }
}

const TRANSIENT_PATTERN =
    /\b(429|500|502|503|504)\b|rate limit|timed? ?out|econnreset|socket hang up/i

/**
 * Foundry errors say whether they are retryable. Anything else thrown by
 * an executor is judged by its message.
 */
export function isRetryable(error: unknown): boolean {
    if (error instanceof RetryableError) return true
    if (error instanceof LLMError) return error.retryable
    if (error instanceof FoundryError) return false
    if (error instanceof Error) return TRANSIENT_PATTERN.test(error.message)
    return false
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}
