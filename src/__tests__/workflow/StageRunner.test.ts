import { describe, expect, it, vi } from "vitest"

import {
    CancelledError,
    FatalError,
    RetryableError,
    StageExhaustedError,
    StageTimeoutError,
} from "../../core/errors.js"
import {
    backoffDelay,
    runStage,
    sleep,
    type StageRunOptions,
} from "../../workflow/StageRunner.js"

const OPTIONS: StageRunOptions = {
    role: "writing",
    stage: "writing",
    timeoutMs: 1000,
    maxRetries: 2,
    baseDelayMs: 1,
    maxDelayMs: 4,
}

/** Never settles on its own; rejects once the attempt signal fires. */
function hang(signal: AbortSignal): Promise<string> {
    return new Promise((_, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")))
    })
}

describe("backoffDelay", () => {
    it("doubles per attempt up to the ceiling", () => {
        expect(backoffDelay(0, 1000, 8000)).toBe(1000)
        expect(backoffDelay(2, 1000, 8000)).toBe(4000)
        expect(backoffDelay(5, 1000, 8000)).toBe(8000)
    })
})

describe("sleep", () => {
    it("resolves false when the signal fires first", async () => {
        const controller = new AbortController()
        const pending = sleep(10_000, controller.signal)
        controller.abort()
        expect(await pending).toBe(false)
    })

    it("resolves true after the delay", async () => {
        expect(await sleep(1)).toBe(true)
    })
})

describe("runStage", () => {
    it("returns the value of a successful first attempt", async () => {
        const outcome = await runStage(() => Promise.resolve("done"), OPTIONS)
        expect(outcome.ok).toBe(true)
        if (!outcome.ok) return
        expect(outcome.value).toBe("done")
        expect(outcome.attempts).toBe(1)
    })

    it("retries retryable failures with exponential backoff", async () => {
        let calls = 0
        const onRetry = vi.fn()
        const outcome = await runStage(
            () => {
                calls++
                return calls < 3
                    ? Promise.reject(new RetryableError("rate limited"))
                    : Promise.resolve("third time")
            },
            { ...OPTIONS, onRetry }
        )

        expect(outcome.ok).toBe(true)
        expect(outcome.attempts).toBe(3)
        expect(onRetry).toHaveBeenCalledTimes(2)
        expect(onRetry.mock.calls[0]?.[0]).toMatchObject({
            attempt: 1,
            maxRetries: 2,
            delayMs: 1,
        })
        expect(onRetry.mock.calls[1]?.[0]).toMatchObject({
            attempt: 2,
            delayMs: 2,
        })
    })

    it("gives up after the retry budget", async () => {
        const last = new RetryableError("still down")
        const outcome = await runStage(() => Promise.reject(last), OPTIONS)

        expect(outcome.ok).toBe(false)
        if (outcome.ok) return
        expect(outcome.error).toBeInstanceOf(StageExhaustedError)
        expect(outcome.error.code).toBe("RETRIES_EXHAUSTED")
        expect(outcome.error.cause).toBe(last)
        expect(outcome.attempts).toBe(3)
    })

    it("treats a timed-out attempt as retryable", async () => {
        let calls = 0
        const onRetry = vi.fn()
        const outcome = await runStage(
            ({ signal }) => {
                calls++
                return calls === 1 ? hang(signal) : Promise.resolve("late but fine")
            },
            { ...OPTIONS, timeoutMs: 20, onRetry }
        )

        expect(outcome.ok).toBe(true)
        expect(outcome.attempts).toBe(2)
        expect(onRetry.mock.calls[0]?.[0].error).toBeInstanceOf(StageTimeoutError)
    })

    it("does not retry a fatal error", async () => {
        const fatal = new FatalError("bad output")
        const call = vi.fn(() => Promise.reject(fatal))
        const outcome = await runStage(call, OPTIONS)

        expect(call).toHaveBeenCalledTimes(1)
        expect(outcome.ok).toBe(false)
        if (outcome.ok) return
        expect(outcome.error).toBe(fatal)
    })

    it("wraps a non-transient plain error as fatal", async () => {
        const call = vi.fn(() => Promise.reject(new Error("bad input")))
        const outcome = await runStage(call, OPTIONS)

        expect(call).toHaveBeenCalledTimes(1)
        if (outcome.ok) throw new Error("expected failure")
        expect(outcome.error).toBeInstanceOf(FatalError)
        expect(outcome.error.message).toBe("bad input")
    })

    it("retries a plain error that looks transient", async () => {
        let calls = 0
        const outcome = await runStage(() => {
            calls++
            return calls === 1
                ? Promise.reject(new Error("503 Service Unavailable"))
                : Promise.resolve("ok")
        }, OPTIONS)
        expect(outcome.ok).toBe(true)
        expect(outcome.attempts).toBe(2)
    })

    it("cancels an attempt in flight", async () => {
        const controller = new AbortController()
        let attemptSignal: AbortSignal | undefined
        setTimeout(() => controller.abort(), 10)
        const outcome = await runStage(
            ({ signal }) => {
                attemptSignal = signal
                return hang(signal)
            },
            { ...OPTIONS, signal: controller.signal }
        )

        if (outcome.ok) throw new Error("expected cancellation")
        expect(outcome.error).toBeInstanceOf(CancelledError)
        expect(outcome.attempts).toBe(1)
        expect(attemptSignal?.aborted).toBe(true)
    })

    it("cancels during a backoff sleep", async () => {
        const controller = new AbortController()
        setTimeout(() => controller.abort(), 10)
        const startedAt = Date.now()
        const outcome = await runStage(
            () => Promise.reject(new RetryableError("busy")),
            { ...OPTIONS, baseDelayMs: 5000, maxDelayMs: 5000, signal: controller.signal }
        )

        if (outcome.ok) throw new Error("expected cancellation")
        expect(outcome.error).toBeInstanceOf(CancelledError)
        expect(outcome.attempts).toBe(1)
        expect(Date.now() - startedAt).toBeLessThan(5000)
    })

    it("makes no attempt when already cancelled", async () => {
        const controller = new AbortController()
        controller.abort()
        const call = vi.fn(() => Promise.resolve("never"))
        const outcome = await runStage(call, {
            ...OPTIONS,
            signal: controller.signal,
        })

        expect(call).not.toHaveBeenCalled()
        expect(outcome.attempts).toBe(0)
        expect(outcome.ok).toBe(false)
    })

    it("sums usage reported across attempts", async () => {
        let calls = 0
        const outcome = await runStage(
            ({ reportUsage }) => {
                calls++
                reportUsage(0.5, {
                    promptTokens: 100,
                    completionTokens: 20,
                    totalTokens: 120,
                })
                return calls === 1
                    ? Promise.reject(new RetryableError("flaky"))
                    : Promise.resolve("ok")
            },
            OPTIONS
        )

        expect(outcome.costUnits).toBe(1)
        expect(outcome.tokens).toEqual({
            promptTokens: 200,
            completionTokens: 40,
            totalTokens: 240,
        })
    })
})
