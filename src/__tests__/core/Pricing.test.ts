import { describe, expect, it } from "vitest"

import { estimateCost, formatCost, getModelRate } from "../../core/Pricing.js"
import type { TokenUsage } from "../../types.js"

describe("Pricing", () => {
    describe("getModelRate", () => {
        it("should return the rate for a known model", () => {
            expect(getModelRate("gpt-4o")).toEqual({ input: 2.5, output: 10 })
        })

        it("should prefer the longest matching prefix", () => {
            expect(getModelRate("gpt-4o-mini-2024-07-18")).toEqual({
                input: 0.15,
                output: 0.6,
            })
        })

        it("should match dated Claude model names", () => {
            expect(getModelRate("claude-sonnet-4-20250514")).toEqual({
                input: 3,
                output: 15,
            })
        })

        it("should fall back for unknown models", () => {
            expect(getModelRate("unknown-model-xyz")).toEqual({
                input: 3,
                output: 15,
            })
        })
    })

    describe("estimateCost", () => {
        it("should price input and output tokens separately", () => {
            const usage: TokenUsage = {
                promptTokens: 1_000_000,
                completionTokens: 100_000,
                totalTokens: 1_100_000,
            }
            expect(estimateCost("gpt-4o", usage)).toBeCloseTo(3.5)
        })

        it("should handle zero tokens", () => {
            const usage: TokenUsage = {
                promptTokens: 0,
                completionTokens: 0,
                totalTokens: 0,
            }
            expect(estimateCost("gpt-4o", usage)).toBe(0)
        })

        it("should calculate fractional costs", () => {
            const usage: TokenUsage = {
                promptTokens: 1000,
                completionTokens: 500,
                totalTokens: 1500,
            }
            expect(estimateCost("gpt-4o", usage)).toBeCloseTo(0.0075)
        })
    })

    describe("formatCost", () => {
        it("should format small costs with 4 decimal places", () => {
            expect(formatCost(0.0025)).toBe("$0.0025")
        })

        it("should format larger costs with 2 decimal places", () => {
            expect(formatCost(1.5)).toBe("$1.50")
        })

        it("should format zero", () => {
            expect(formatCost(0)).toBe("$0.0000")
        })

        it("should format costs at the threshold", () => {
            expect(formatCost(0.01)).toBe("$0.01")
        })
    })
})
