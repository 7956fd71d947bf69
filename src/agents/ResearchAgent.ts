import type {
    ResearchExecutor,
    ResearchResult,
    StageContext,
} from "../types.js"
import { buildResearchRequest } from "./prompts.js"
import { researchOutputSchema } from "./schemas.js"
import { StructuredAgent, type StructuredAgentOptions } from "./StructuredAgent.js"

export class ResearchAgent implements ResearchExecutor {
    private readonly agent: StructuredAgent<typeof researchOutputSchema>

    constructor(options: StructuredAgentOptions) {
        this.agent = new StructuredAgent("research", researchOutputSchema, options)
    }

    public async run(
        topic: string,
        context?: StageContext
    ): Promise<ResearchResult> {
        const output = await this.agent.complete(
            buildResearchRequest(topic),
            context
        )
        return {
            topic,
            findings: [...output.findings].sort(
                (a, b) => b.relevanceScore - a.relevanceScore
            ),
            summary: output.summary,
            confidence: output.confidence,
        }
    }
}
