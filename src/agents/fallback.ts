import { log } from "../core/Logger.js"
import type { ResearchFallback } from "../types.js"

/** Degraded mode: let the writer work from the topic alone. */
export const minimalResearchFallback: ResearchFallback = (topic, error) => {
    log.workflow("Using minimal research for %s after: %s", topic, error.message)
    return {
        topic,
        findings: [],
        summary: `Limited research available for ${topic}. Write from general knowledge and avoid specific statistics.`,
        confidence: 0.1,
    }
}
