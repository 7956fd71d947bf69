import type {
    Draft,
    ResearchResult,
    StageContext,
    WritingExecutor,
} from "../types.js"
import { buildDraftRequest, buildRevisionRequest } from "./prompts.js"
import { draftOutputSchema, type DraftOutput } from "./schemas.js"
import { StructuredAgent, type StructuredAgentOptions } from "./StructuredAgent.js"

export const DEFAULT_TARGET_WORDS = 1200

export interface WritingAgentOptions extends StructuredAgentOptions {
    targetWords?: number
}

export function countWords(text: string): number {
    return text.split(/\s+/).filter((word) => /[\p{L}\p{N}]/u.test(word))
        .length
}

export function toDraft(output: DraftOutput): Draft {
    const wordCount = [
        output.introduction,
        ...output.bodySections,
        output.conclusion,
    ].reduce((sum, part) => sum + countWords(part), 0)
    return { ...output, bodySections: [...output.bodySections], wordCount }
}

/** Writes the first draft, or a revision when given a prior draft and feedback. */
export class WritingAgent implements WritingExecutor {
    private readonly agent: StructuredAgent<typeof draftOutputSchema>
    private readonly targetWords: number

    constructor(options: WritingAgentOptions) {
        this.agent = new StructuredAgent("writing", draftOutputSchema, options)
        this.targetWords = options.targetWords ?? DEFAULT_TARGET_WORDS
    }

    public async run(
        topic: string,
        research: ResearchResult,
        priorDraft?: Draft,
        feedback?: string,
        context?: StageContext
    ): Promise<Draft> {
        const request =
            priorDraft && feedback
                ? buildRevisionRequest(topic, research, priorDraft, feedback)
                : buildDraftRequest(topic, research, this.targetWords)
        return toDraft(await this.agent.complete(request, context))
    }
}
