import type {
    Feedback,
    FeedbackItem,
    RevisionDecision,
    RevisionLimits,
} from "../types.js"

export type PolicyLimits = Pick<
    RevisionLimits,
    | "maxIterations"
    | "qualityThreshold"
    | "reviseMargin"
    | "severityWeights"
    | "severityReviseThreshold"
>

export function severityScore(
    items: readonly FeedbackItem[],
    weights: PolicyLimits["severityWeights"]
): number {
    return items.reduce((sum, item) => sum + weights[item.severity], 0)
}

/**
 * Decide what follows a critique. Rules apply in order: unusable score,
 * iteration budget, explicit approval, threshold, severity, margin.
 *
 * @param iteration - completed revision cycles so far (0-based)
 */
export function decideRevision(
    feedback: Feedback,
    iteration: number,
    limits: PolicyLimits
): RevisionDecision {
    const score = feedback.overallQuality
    if (!Number.isFinite(score) || score < 0 || score > 10) {
        return {
            action: "abandon",
            reason: "unusable_feedback",
            detail: `Quality score ${String(score)} is outside [0, 10]`,
        }
    }

    if (iteration + 1 >= limits.maxIterations) {
        return {
            action: "accept",
            reason: "budget_exhausted",
            detail: `Maximum iterations (${limits.maxIterations}) reached`,
        }
    }

    if (feedback.approval === "approved") {
        return {
            action: "accept",
            reason: "approved",
            detail: "Draft approved by critique",
        }
    }

    if (score >= limits.qualityThreshold) {
        return {
            action: "accept",
            reason: "threshold_met",
            detail: `Quality ${score.toFixed(1)} meets threshold ${limits.qualityThreshold}`,
        }
    }

    const weighted = severityScore(feedback.items, limits.severityWeights)
    if (weighted >= limits.severityReviseThreshold) {
        const majors = feedback.items.filter(
            (item) => item.severity === "major"
        ).length
        return {
            action: "revise",
            reason: "major_issues",
            detail: `Severity score ${weighted} (${majors} major) calls for revision`,
        }
    }

    const gap = limits.qualityThreshold - score
    if (gap > limits.reviseMargin) {
        return {
            action: "revise",
            reason: "below_margin",
            detail: `Quality ${score.toFixed(1)} is ${gap.toFixed(1)} below threshold`,
        }
    }

    return {
        action: "accept",
        reason: "within_margin",
        detail: `Quality ${score.toFixed(1)} is within ${limits.reviseMargin} of threshold`,
    }
}
