import { vi } from "vitest"

import type { LLMProvider, LLMResponse, TokenUsage } from "../../types.js"

export const MOCK_USAGE: TokenUsage = {
    promptTokens: 1000,
    completionTokens: 500,
    totalTokens: 1500,
}

export function createMockProvider(responses: LLMResponse[]): LLMProvider {
    let callIndex = 0
    return {
        chat: vi.fn((): Promise<LLMResponse> => {
            const response = responses[callIndex]
            if (!response) {
                return Promise.reject(
                    new Error(`No mock response for call index ${callIndex}`)
                )
            }
            callIndex++
            return Promise.resolve(response)
        }),
    }
}

export function mockJsonResponse(
    body: unknown,
    usage: TokenUsage = MOCK_USAGE
): LLMResponse {
    return { content: JSON.stringify(body), usage }
}

export function mockResearchResponse(findingCount = 2): LLMResponse {
    return mockJsonResponse({
        findings: Array.from({ length: findingCount }, (_, i) => ({
            fact: `Finding ${i + 1}`,
            sourceUrl: `https://example.com/${i + 1}`,
            relevanceScore: 0.5 + i / 10,
            category: "study",
        })),
        summary: "Mock research summary",
        confidence: 0.8,
    })
}

export function mockDraftResponse(title = "Mock Article"): LLMResponse {
    return mockJsonResponse({
        title,
        introduction: "One two three four.",
        bodySections: ["## First\n\nFive six seven.", "## Second\n\nEight nine."],
        conclusion: "Ten.",
    })
}

export function mockCritiqueResponse(
    overallQuality: number,
    approval: "approved" | "needs_revision",
    majorIssues = 0
): LLMResponse {
    return mockJsonResponse({
        overallQuality,
        items: Array.from({ length: majorIssues }, (_, i) => ({
            section: "body",
            issue: `Issue ${i + 1}`,
            suggestion: `Fix ${i + 1}`,
            severity: "major",
        })),
        approval,
        summary: "Mock critique",
    })
}
