import Anthropic from "@anthropic-ai/sdk"

import { LLMError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type {
    LLMMessage,
    LLMProvider,
    LLMResponse,
    ModelConfig,
    TokenUsage,
} from "../types.js"
import { classifyFailure } from "./classify.js"

export class AnthropicProvider implements LLMProvider {
    private client: Anthropic

    constructor(apiKey: string) {
        this.client = new Anthropic({ apiKey, maxRetries: 0 })
    }

    public async chat(
        messages: LLMMessage[],
        model: ModelConfig,
        signal?: AbortSignal
    ): Promise<LLMResponse> {
        try {
            const { system, anthropicMessages } = convertMessages(messages)
            const response = await this.client.messages.create(
                {
                    model: model.model,
                    system: system || undefined,
                    messages: anthropicMessages,
                    temperature: model.temperature,
                    max_tokens: model.maxTokens ?? 4096,
                },
                { signal }
            )

            let content = ""
            for (const block of response.content) {
                if (block.type === "text") {
                    content += block.text
                }
            }
            if (response.stop_reason === "max_tokens") {
                log.llm("%s stopped at max_tokens", model.model)
            }

            const usage: TokenUsage = {
                promptTokens: response.usage.input_tokens,
                completionTokens: response.usage.output_tokens,
                totalTokens:
                    response.usage.input_tokens + response.usage.output_tokens,
            }
            return { content, usage }
        } catch (error) {
            if (error instanceof LLMError) throw error
            throw classifyFailure("anthropic", error, {
                status:
                    error instanceof Anthropic.APIError
                        ? error.status
                        : undefined,
                connection: error instanceof Anthropic.APIConnectionError,
            })
        }
    }
}

interface ConvertedMessages {
    system: string
    anthropicMessages: Anthropic.MessageParam[]
}

function convertMessages(messages: LLMMessage[]): ConvertedMessages {
    let system = ""
    const anthropicMessages: Anthropic.MessageParam[] = []

    for (const msg of messages) {
        if (msg.role === "system") {
            system += (system ? "\n\n" : "") + msg.content
            continue
        }
        anthropicMessages.push({ role: msg.role, content: msg.content })
    }

    return { system, anthropicMessages }
}
