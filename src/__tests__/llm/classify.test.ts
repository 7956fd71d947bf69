import { describe, expect, it } from "vitest"

import { isRetryable, LLMError } from "../../core/errors.js"
import { classifyFailure, isRetryableStatus } from "../../llm/classify.js"

describe("classifyFailure", () => {
    it.each([408, 409, 429, 500, 502, 503, 504, 529])(
        "treats status %i as retryable",
        (status) => {
            const error = classifyFailure("openai", new Error("boom"), { status })
            expect(error.retryable).toBe(true)
            expect(isRetryable(error)).toBe(true)
        }
    )

    it.each([400, 401, 403, 404, 422])("treats status %i as fatal", (status) => {
        const error = classifyFailure("anthropic", new Error("nope"), { status })
        expect(error.retryable).toBe(false)
        expect(isRetryable(error)).toBe(false)
    })

    it("treats connection failures as retryable", () => {
        const error = classifyFailure("openai", new Error("ECONNRESET"), {
            connection: true,
        })
        expect(error.retryable).toBe(true)
        expect(error.status).toBeUndefined()
    })

    it("names the provider and status in the message", () => {
        const cause = new Error("Rate limit reached")
        const error = classifyFailure("anthropic", cause, { status: 429 })
        expect(error).toBeInstanceOf(LLMError)
        expect(error.message).toBe("anthropic API error (429): Rate limit reached")
        expect(error.cause).toBe(cause)
    })
})

describe("isRetryableStatus", () => {
    it("rejects client errors", () => {
        expect(isRetryableStatus(400)).toBe(false)
        expect(isRetryableStatus(503)).toBe(true)
    })
})
