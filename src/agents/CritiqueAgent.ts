import { DEFAULT_LIMITS } from "../core/Config.js"
import type {
    CritiqueExecutor,
    Draft,
    Feedback,
    ResearchResult,
    StageContext,
} from "../types.js"
import { buildCritiqueRequest } from "./prompts.js"
import { critiqueOutputSchema } from "./schemas.js"
import { StructuredAgent, type StructuredAgentOptions } from "./StructuredAgent.js"

export interface CritiqueAgentOptions extends StructuredAgentOptions {
    /** Shown to the model as the bar for approval. */
    qualityThreshold?: number
}

export class CritiqueAgent implements CritiqueExecutor {
    private readonly agent: StructuredAgent<typeof critiqueOutputSchema>
    private readonly qualityThreshold: number

    constructor(options: CritiqueAgentOptions) {
        this.agent = new StructuredAgent("critique", critiqueOutputSchema, options)
        this.qualityThreshold =
            options.qualityThreshold ?? DEFAULT_LIMITS.qualityThreshold
    }

    public async run(
        draft: Draft,
        research: ResearchResult,
        context?: StageContext
    ): Promise<Feedback> {
        const output = await this.agent.complete(
            buildCritiqueRequest(draft, research, this.qualityThreshold),
            context
        )
        return {
            overallQuality: output.overallQuality,
            items: output.items.map((item) => ({ ...item })),
            approval: output.approval,
            summary: output.summary,
        }
    }
}
