import type { Draft, ResearchResult } from "../types.js"

export interface MarkdownOptions {
    /** Append the research sources as a list. */
    includeSources?: boolean
    research?: ResearchResult | null
}

/** Headings the writer put in a section are kept; bare sections get none. */
export function renderDraftMarkdown(
    draft: Draft,
    options: MarkdownOptions = {}
): string {
    const parts = [`# ${draft.title.trim()}`, draft.introduction.trim()]
    for (const section of draft.bodySections) {
        parts.push(section.trim())
    }
    parts.push(draft.conclusion.trim())

    const sources = options.includeSources
        ? uniqueSources(options.research)
        : []
    if (sources.length > 0) {
        parts.push(
            ["## Sources", "", ...sources.map((url) => `- ${url}`)].join("\n")
        )
    }
    return parts.filter(Boolean).join("\n\n") + "\n"
}

function uniqueSources(research: ResearchResult | null | undefined): string[] {
    if (!research) return []
    const seen = new Set<string>()
    for (const finding of research.findings) {
        const url = finding.sourceUrl.trim()
        if (url) seen.add(url)
    }
    return [...seen]
}
