import {
    CancelledError,
    FatalError,
    FoundryError,
    isRetryable,
    StageExhaustedError,
    StageTimeoutError,
    toError,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import type {
    ExecutorRole,
    StageContext,
    TokenUsage,
    WorkflowStage,
} from "../types.js"

export interface RetryNotice {
    /** 1-based number of the retry about to happen. */
    attempt: number
    maxRetries: number
    delayMs: number
    error: Error
}

export interface StageRunOptions {
    role: ExecutorRole
    stage: WorkflowStage
    timeoutMs: number
    maxRetries: number
    baseDelayMs: number
    maxDelayMs: number
    signal?: AbortSignal
    onRetry?: (notice: RetryNotice) => void
}

export interface StageStats {
    attempts: number
    durationMs: number
    costUnits: number
    tokens: TokenUsage
}

export type StageOutcome<T> = StageStats &
    ({ ok: true; value: T } | { ok: false; error: FoundryError })

export function backoffDelay(
    attempt: number,
    baseDelayMs: number,
    maxDelayMs: number
): number {
    return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs)
}

/** Resolves false if the signal fired before the delay elapsed. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve(false)
            return
        }
        if (ms <= 0) {
            resolve(true)
            return
        }
        const onAbort = (): void => {
            clearTimeout(timer)
            resolve(false)
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort)
            resolve(true)
        }, ms)
        signal?.addEventListener("abort", onAbort, { once: true })
    })
}

function runAttempt<T>(
    call: (signal: AbortSignal) => Promise<T>,
    options: StageRunOptions
): Promise<T> {
    const { role, stage, timeoutMs, signal: outer } = options
    return new Promise<T>((resolve, reject) => {
        const controller = new AbortController()
        let settled = false
        let timer: ReturnType<typeof setTimeout> | undefined

        const settle = (finish: () => void): void => {
            if (settled) return
            settled = true
            clearTimeout(timer)
            outer?.removeEventListener("abort", onAbort)
            finish()
        }
        const onAbort = (): void => {
            const error = new CancelledError(stage)
            controller.abort(error)
            settle(() => reject(error))
        }

        timer = setTimeout(() => {
            const error = new StageTimeoutError(role, timeoutMs)
            controller.abort(error)
            settle(() => reject(error))
        }, timeoutMs)
        outer?.addEventListener("abort", onAbort, { once: true })

        let pending: Promise<T>
        try {
            pending = call(controller.signal)
        } catch (error) {
            pending = Promise.reject(toError(error))
        }
        pending.then(
            (value) => settle(() => resolve(value)),
            (error: unknown) => {
                if (settled) {
                    log.stage(
                        "Abandoned %s attempt settled late: %s",
                        role,
                        toError(error).message
                    )
                    return
                }
                settle(() => reject(toError(error)))
            }
        )
    })
}

/**
 * Run one stage executor call under the stage budget: each attempt gets
 * its own timeout, retryable failures back off exponentially, and the
 * workflow signal cancels both attempts and backoff sleeps.
 */
export async function runStage<T>(
    call: (context: StageContext) => Promise<T>,
    options: StageRunOptions
): Promise<StageOutcome<T>> {
    const startedAt = Date.now()
    const tokens: TokenUsage = {
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
    }
    let costUnits = 0
    let attempts = 0
    let lastError: Error | undefined

    const stats = (): StageStats => ({
        attempts,
        durationMs: Date.now() - startedAt,
        costUnits,
        tokens: { ...tokens },
    })
    const fail = (error: FoundryError): StageOutcome<T> => ({
        ok: false,
        error,
        ...stats(),
    })
    const reportUsage = (units: number, usage?: TokenUsage): void => {
        if (Number.isFinite(units) && units > 0) costUnits += units
        if (usage) {
            tokens.promptTokens += usage.promptTokens
            tokens.completionTokens += usage.completionTokens
            tokens.totalTokens += usage.totalTokens
        }
    }

    for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
        if (options.signal?.aborted) {
            return fail(new CancelledError(options.stage))
        }
        attempts++
        try {
            const value = await runAttempt(
                (signal) => call({ signal, attempt, reportUsage }),
                options
            )
            return { ok: true, value, ...stats() }
        } catch (error) {
            const err = toError(error)
            if (err instanceof CancelledError) return fail(err)
            if (!isRetryable(err)) {
                log.stage("%s failed without retry: %s", options.role, err.message)
                return fail(
                    err instanceof FoundryError
                        ? err
                        : new FatalError(err.message, err, {
                              role: options.role,
                          })
                )
            }
            lastError = err
            if (attempt === options.maxRetries) break

            const delayMs = backoffDelay(
                attempt,
                options.baseDelayMs,
                options.maxDelayMs
            )
            log.stage(
                "%s attempt %d/%d failed, retrying in %dms: %s",
                options.role,
                attempt + 1,
                options.maxRetries + 1,
                delayMs,
                err.message
            )
            options.onRetry?.({
                attempt: attempt + 1,
                maxRetries: options.maxRetries,
                delayMs,
                error: err,
            })
            const slept = await sleep(delayMs, options.signal)
            if (!slept) return fail(new CancelledError(options.stage))
        }
    }

    return fail(new StageExhaustedError(options.role, attempts, lastError))
}
