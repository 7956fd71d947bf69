import type { LLMProvider, ModelConfig, StageExecutors } from "../types.js"
import { CritiqueAgent } from "./CritiqueAgent.js"
import { ResearchAgent } from "./ResearchAgent.js"
import { WritingAgent } from "./WritingAgent.js"

export interface AgentBinding {
    provider: LLMProvider
    model: ModelConfig
}

export interface LLMExecutorOptions {
    research: AgentBinding
    writing: AgentBinding
    critique: AgentBinding
    qualityThreshold?: number
    targetWords?: number
}

export function createLLMExecutors(options: LLMExecutorOptions): StageExecutors {
    return {
        research: new ResearchAgent(options.research),
        writing: new WritingAgent({
            ...options.writing,
            targetWords: options.targetWords,
        }),
        critique: new CritiqueAgent({
            ...options.critique,
            qualityThreshold: options.qualityThreshold,
        }),
    }
}

export { CritiqueAgent } from "./CritiqueAgent.js"
export { minimalResearchFallback } from "./fallback.js"
export { ResearchAgent } from "./ResearchAgent.js"
export { extractJson, StructuredAgent } from "./StructuredAgent.js"
export { countWords, WritingAgent } from "./WritingAgent.js"
