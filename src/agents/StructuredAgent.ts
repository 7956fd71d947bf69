import type { z } from "zod"

import { OutputValidationError, toError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import { estimateCost } from "../core/Pricing.js"
import type {
    ExecutorRole,
    LLMMessage,
    LLMProvider,
    ModelConfig,
    StageContext,
} from "../types.js"
import { getSystemPrompt } from "./prompts.js"

export interface StructuredAgentOptions {
    provider: LLMProvider
    model: ModelConfig
}

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/

/**
 * Pull the JSON object out of a model reply. Models sometimes wrap it in
 * a code fence or add a sentence around it.
 */
export function extractJson(content: string): string {
    const trimmed = content.trim()
    const fenced = FENCE_PATTERN.exec(trimmed)
    if (fenced?.[1]) return fenced[1].trim()
    const start = trimmed.indexOf("{")
    const end = trimmed.lastIndexOf("}")
    if (start !== -1 && end > start) return trimmed.slice(start, end + 1)
    return trimmed
}

/**
 * One-shot LLM call whose reply must be a JSON object matching `schema`.
 * Usage is reported to the stage context as estimated USD.
 */
export class StructuredAgent<S extends z.ZodTypeAny> {
    private readonly role: ExecutorRole
    private readonly schema: S
    private readonly provider: LLMProvider
    private readonly model: ModelConfig

    constructor(role: ExecutorRole, schema: S, options: StructuredAgentOptions) {
        this.role = role
        this.schema = schema
        this.provider = options.provider
        this.model = options.model
    }

    public async complete(
        request: string,
        context?: StageContext
    ): Promise<z.infer<S>> {
        const messages: LLMMessage[] = [
            { role: "system", content: getSystemPrompt(this.role) },
            { role: "user", content: request },
        ]
        log.llm(
            "%s → %s (attempt %d)",
            this.role,
            this.model.model,
            (context?.attempt ?? 0) + 1
        )
        const response = await this.provider.chat(
            messages,
            this.model,
            context?.signal
        )
        context?.reportUsage(
            estimateCost(this.model.model, response.usage),
            response.usage
        )
        log.llm(
            "%s ← %d prompt / %d completion tokens",
            this.role,
            response.usage.promptTokens,
            response.usage.completionTokens
        )
        return this.parse(response.content)
    }

    private parse(content: string): z.infer<S> {
        let raw: unknown
        try {
            raw = JSON.parse(extractJson(content))
        } catch (error) {
            throw new OutputValidationError(this.role, [
                `response is not valid JSON: ${toError(error).message}`,
            ])
        }
        const parsed = this.schema.safeParse(raw)
        if (!parsed.success) {
            throw new OutputValidationError(
                this.role,
                parsed.error.issues.map(
                    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
                )
            )
        }
        return parsed.data
    }
}
