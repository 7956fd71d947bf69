import type { Feedback, FeedbackItem, FeedbackSeverity } from "../types.js"

const MAX_MINOR_ITEMS = 3

const SECTION_HEADINGS: ReadonlyArray<[FeedbackSeverity, string]> = [
    ["major", "CRITICAL ISSUES TO ADDRESS:"],
    ["moderate", "IMPORTANT IMPROVEMENTS:"],
    ["minor", "MINOR ENHANCEMENTS:"],
]

function formatItem(item: FeedbackItem): string {
    return `- ${item.section}: ${item.issue} -> ${item.suggestion}`
}

/**
 * Render critique feedback as revision instructions for the writer,
 * grouped by severity with at most three minor items.
 */
export function formatFeedbackForRevision(feedback: Feedback): string {
    const parts = [feedback.summary]
    for (const [severity, heading] of SECTION_HEADINGS) {
        let items = feedback.items.filter((item) => item.severity === severity)
        if (severity === "minor") items = items.slice(0, MAX_MINOR_ITEMS)
        if (items.length === 0) continue
        parts.push(`\n${heading}`)
        parts.push(...items.map(formatItem))
    }
    return parts.join("\n")
}
