import type { TokenUsage } from "../types.js"
import { log } from "./Logger.js"

/** USD per million tokens. */
export interface ModelRate {
    input: number
    output: number
}

const FALLBACK_RATE: ModelRate = { input: 3, output: 15 }

const MODEL_RATES: ReadonlyArray<[prefix: string, rate: ModelRate]> = [
    ["claude-opus-4", { input: 15, output: 75 }],
    ["claude-sonnet-4", { input: 3, output: 15 }],
    ["claude-3-5-haiku", { input: 0.8, output: 4 }],
    ["gpt-4o-mini", { input: 0.15, output: 0.6 }],
    ["gpt-4o", { input: 2.5, output: 10 }],
    ["gpt-4.1-nano", { input: 0.1, output: 0.4 }],
    ["gpt-4.1-mini", { input: 0.4, output: 1.6 }],
    ["gpt-4.1", { input: 2, output: 8 }],
]

/** Longer prefixes are listed first so "gpt-4o-mini" wins over "gpt-4o". */
export function getModelRate(model: string): ModelRate {
    const match = MODEL_RATES.find(([prefix]) => model.startsWith(prefix))
    if (match) return match[1]
    log.llm("No rate known for model %s, using fallback", model)
    return FALLBACK_RATE
}

/**
 * Estimated spend of one LLM call in USD. This is the cost unit the LLM
 * executors report to the usage aggregator.
 */
export function estimateCost(model: string, usage: TokenUsage): number {
    const rate = getModelRate(model)
    return (
        (usage.promptTokens / 1_000_000) * rate.input +
        (usage.completionTokens / 1_000_000) * rate.output
    )
}

export function formatCost(cost: number): string {
    if (cost < 0.01) return `$${cost.toFixed(4)}`
    return `$${cost.toFixed(2)}`
}
