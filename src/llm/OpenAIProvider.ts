import OpenAI from "openai"

import { LLMError } from "../core/errors.js"
import type {
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
    TokenUsage,
} from "../types.js"
import { classifyFailure } from "./classify.js"

export class OpenAIProvider implements LLMProvider {
    private client: OpenAI

    constructor(apiKey: string) {
        this.client = new OpenAI({ apiKey, maxRetries: 0 })
    }

    public async chat(
        messages: LLMMessage[],
        model: ModelConfig,
        signal?: AbortSignal
    ): Promise<LLMResponse> {
        try {
            const response = await this.client.chat.completions.create(
                {
                    model: model.model,
                    messages: messages.map(toOpenAIMessage),
                    temperature: model.temperature,
                    max_completion_tokens: model.maxTokens,
                    response_format: { type: "json_object" },
                },
                { signal }
            )

            const choice = response.choices[0]
            if (!choice) {
                throw new LLMError("OpenAI returned no choices", true)
            }

            const usage: TokenUsage = {
                promptTokens: response.usage?.prompt_tokens ?? 0,
                completionTokens: response.usage?.completion_tokens ?? 0,
                totalTokens: response.usage?.total_tokens ?? 0,
            }
            return { content: choice.message.content ?? "", usage }
        } catch (error) {
            if (error instanceof LLMError) throw error
            throw classifyFailure("openai", error, {
                status:
                    error instanceof OpenAI.APIError ? error.status : undefined,
                connection: error instanceof OpenAI.APIConnectionError,
            })
        }
    }
}

function toOpenAIMessage(msg: LLMMessage): OpenAI.ChatCompletionMessageParam {
    switch (msg.role) {
        case "system":
            return { role: "system", content: msg.content }
        case "user":
            return { role: "user", content: msg.content }
        case "assistant":
            return { role: "assistant", content: msg.content }
    }
}
