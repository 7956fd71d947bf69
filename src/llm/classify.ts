import { LLMError } from "../core/errors.js"
import type { LLMProviderType } from "../types.js"

const RETRYABLE_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504, 529])

export interface FailureDetails {
    status?: number
    /** The request never got an HTTP response (DNS, reset, client timeout). */
    connection?: boolean
}

export function isRetryableStatus(status: number): boolean {
    return RETRYABLE_STATUSES.has(status)
}

export function classifyFailure(
    provider: LLMProviderType,
    error: unknown,
    details: FailureDetails
): LLMError {
    const message = error instanceof Error ? error.message : String(error)
    const retryable =
        details.connection === true ||
        (details.status !== undefined && isRetryableStatus(details.status))
    return new LLMError(
        `${provider} API error${details.status ? ` (${details.status})` : ""}: ${message}`,
        retryable,
        details.status,
        error instanceof Error ? error : undefined
    )
}
