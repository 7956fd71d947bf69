import { describe, expect, it } from "vitest"

import { UsageAggregator } from "../../metrics/UsageAggregator.js"

describe("UsageAggregator", () => {
    it("starts empty", () => {
        const snapshot = new UsageAggregator().snapshot()
        expect(snapshot.costUnits).toBe(0)
        expect(snapshot.revisionCount).toBe(0)
        expect(snapshot.stages.writing).toEqual({
            calls: 0,
            failures: 0,
            retries: 0,
            elapsedMs: 0,
        })
    })

    it("totals calls, failures, retries, time and cost per stage", () => {
        const aggregator = new UsageAggregator()
        aggregator.record({
            role: "writing",
            outcome: "success",
            durationMs: 100,
            attempts: 1,
            costUnits: 0.5,
            tokens: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
        })
        aggregator.record({
            role: "writing",
            outcome: "failure",
            durationMs: 250,
            attempts: 3,
            costUnits: 0.25,
            revision: true,
        })
        aggregator.record({
            role: "critique",
            outcome: "success",
            durationMs: 40,
            attempts: 2,
            costUnits: 1,
        })

        const snapshot = aggregator.snapshot()
        expect(snapshot.stages.writing).toEqual({
            calls: 2,
            failures: 1,
            retries: 2,
            elapsedMs: 350,
        })
        expect(snapshot.stages.critique).toEqual({
            calls: 1,
            failures: 0,
            retries: 1,
            elapsedMs: 40,
        })
        expect(snapshot.costUnits).toBe(1.75)
        expect(snapshot.tokens).toEqual({
            promptTokens: 10,
            completionTokens: 5,
            totalTokens: 15,
        })
        expect(snapshot.revisionCount).toBe(1)
        expect(aggregator.costUnits).toBe(1.75)
    })

    it("returns snapshots that later updates do not change", () => {
        const aggregator = new UsageAggregator()
        const before = aggregator.snapshot()
        aggregator.record({
            role: "research",
            outcome: "success",
            durationMs: 10,
            attempts: 1,
            costUnits: 2,
        })
        aggregator.setIteration(1)

        expect(before.stages.research.calls).toBe(0)
        expect(before.iteration).toBe(0)
        expect(aggregator.snapshot().iteration).toBe(1)
        expect(Object.isFrozen(before)).toBe(true)
        expect(Object.isFrozen(before.stages.research)).toBe(true)
    })
})
