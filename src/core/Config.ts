import { z } from "zod"

import type {
    ExecutorRole,
    LLMProviderType,
    ModelConfig,
    RevisionLimits,
} from "../types.js"
import { InvalidLimitsError } from "./errors.js"

const DEFAULT_MODELS: Record<ExecutorRole, ModelConfig> = {
    research: {
        provider: "openai",
        model: "gpt-4o",
        temperature: 0.3,
        maxTokens: 4096,
    },
    writing: {
        provider: "anthropic",
        model: "claude-sonnet-4-20250514",
        temperature: 0.7,
        maxTokens: 8192,
    },
    critique: {
        provider: "openai",
        model: "gpt-4o",
        temperature: 0.1,
        maxTokens: 4096,
    },
}

const PROVIDER_MODELS: Record<LLMProviderType, string> = {
    openai: "gpt-4o",
    anthropic: "claude-sonnet-4-20250514",
}

export const DEFAULT_LIMITS: RevisionLimits = {
    maxIterations: 3,
    qualityThreshold: 7,
    stageTimeoutMs: 120_000,
    maxRetries: 2,
    baseDelayMs: 1000,
    maxDelayMs: 8000,
    reviseMargin: 0.5,
    severityWeights: { minor: 0, moderate: 0, major: 1 },
    severityReviseThreshold: 1,
}

const limitsSchema = z
    .object({
        maxIterations: z.number().int().min(1),
        qualityThreshold: z.number().min(0).max(10),
        stageTimeoutMs: z.number().positive(),
        maxRetries: z.number().int().min(0),
        baseDelayMs: z.number().min(0),
        maxDelayMs: z.number().min(0),
        reviseMargin: z.number().min(0),
        severityWeights: z.object({
            minor: z.number().min(0),
            moderate: z.number().min(0),
            major: z.number().min(0),
        }),
        severityReviseThreshold: z.number().positive(),
    })
    .refine((limits) => limits.maxDelayMs >= limits.baseDelayMs, {
        message: "maxDelayMs must not be below baseDelayMs",
        path: ["maxDelayMs"],
    })

export const partialLimitsSchema = z
    .object({
        maxIterations: z.number(),
        qualityThreshold: z.number(),
        stageTimeoutMs: z.number(),
        maxRetries: z.number(),
        baseDelayMs: z.number(),
        maxDelayMs: z.number(),
        reviseMargin: z.number(),
        severityWeights: z.object({
            minor: z.number(),
            moderate: z.number(),
            major: z.number(),
        }),
        severityReviseThreshold: z.number(),
    })
    .partial()

/**
 * Merge override layers onto the defaults, later layers winning, and
 * validate the result. Undefined values leave the earlier value alone.
 */
export function resolveLimits(
    ...layers: (Partial<RevisionLimits> | undefined)[]
): RevisionLimits {
    const merged: RevisionLimits = { ...DEFAULT_LIMITS }
    for (const overrides of layers) {
        if (!overrides) continue
        for (const [key, value] of Object.entries(overrides)) {
            if (value !== undefined) {
                Object.assign(merged, { [key]: value })
            }
        }
    }
    const parsed = limitsSchema.safeParse(merged)
    if (!parsed.success) {
        throw new InvalidLimitsError(
            parsed.error.issues.map(
                (issue) => `${issue.path.join(".")}: ${issue.message}`
            )
        )
    }
    return parsed.data
}

export function getDefaultModel(
    role: ExecutorRole,
    overrideProvider?: LLMProviderType,
    overrideModel?: string
): ModelConfig {
    const base = DEFAULT_MODELS[role]
    const provider = overrideProvider ?? base.provider
    const fallbackModel =
        provider === base.provider ? base.model : PROVIDER_MODELS[provider]
    return {
        ...base,
        provider,
        model: overrideModel ?? fallbackModel,
    }
}
