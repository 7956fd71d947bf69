import { vi } from "vitest"

import type {
    Draft,
    Feedback,
    FeedbackItem,
    ResearchResult,
    StageContext,
} from "../../types.js"

/** Limits that keep retry tests fast. */
export const FAST_LIMITS = {
    stageTimeoutMs: 1000,
    baseDelayMs: 1,
    maxDelayMs: 4,
}

export function makeResearch(
    topic = "Test Topic",
    findingCount = 3,
    confidence = 0.8
): ResearchResult {
    return {
        topic,
        findings: Array.from({ length: findingCount }, (_, i) => ({
            fact: `Fact ${i + 1}`,
            sourceUrl: `https://example.com/${i + 1}`,
            relevanceScore: 0.9,
            category: "statistic",
        })),
        summary: `Research on ${topic}`,
        confidence,
    }
}

export function makeDraft(title = "Draft", wordCount = 600): Draft {
    return {
        title,
        introduction: "Intro",
        bodySections: ["Body"],
        conclusion: "Conclusion",
        wordCount,
    }
}

export function makeItem(
    severity: FeedbackItem["severity"],
    issue = `${severity} issue`
): FeedbackItem {
    return { section: "body", issue, suggestion: `address ${issue}`, severity }
}

export function makeFeedback(
    overallQuality: number,
    approval: Feedback["approval"] = "needs_revision",
    items: FeedbackItem[] = []
): Feedback {
    return { overallQuality, items, approval, summary: "Summary" }
}

/**
 * Executors that answer from fixed data. Writing returns "Draft 1",
 * "Draft 2", … in call order; critique walks through `feedback`,
 * repeating the last entry.
 */
export function scriptedExecutors(options: {
    research?: ResearchResult
    feedback: Feedback[]
    costUnits?: number
}) {
    const research = options.research ?? makeResearch()
    const costUnits = options.costUnits ?? 0
    let drafts = 0
    let critiques = 0
    return {
        research: {
            run: vi.fn((_topic: string, context?: StageContext): Promise<ResearchResult> => {
                context?.reportUsage(costUnits)
                return Promise.resolve(research)
            }),
        },
        writing: {
            run: vi.fn(
                (
                    _topic: string,
                    _research: ResearchResult,
                    _prior?: Draft,
                    _feedback?: string,
                    context?: StageContext
                ): Promise<Draft> => {
                    context?.reportUsage(costUnits)
                    drafts++
                    return Promise.resolve(makeDraft(`Draft ${drafts}`))
                }
            ),
        },
        critique: {
            run: vi.fn(
                (
                    _draft: Draft,
                    _research: ResearchResult,
                    context?: StageContext
                ): Promise<Feedback> => {
                    context?.reportUsage(costUnits)
                    const index = Math.min(critiques, options.feedback.length - 1)
                    critiques++
                    const feedback = options.feedback[index]
                    if (!feedback) {
                        return Promise.reject(new Error("no feedback scripted"))
                    }
                    return Promise.resolve(feedback)
                }
            ),
        },
    }
}
