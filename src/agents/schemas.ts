import { z } from "zod"

export const researchFindingSchema = z.object({
    fact: z.string().min(1),
    sourceUrl: z.string().default(""),
    relevanceScore: z.number().min(0).max(1),
    category: z.string().min(1).default("general"),
})

export const researchOutputSchema = z.object({
    findings: z.array(researchFindingSchema),
    summary: z.string().min(1),
    confidence: z.number().min(0).max(1),
})

export type ResearchOutput = z.infer<typeof researchOutputSchema>

export const draftOutputSchema = z.object({
    title: z.string().min(1),
    introduction: z.string().min(1),
    bodySections: z.array(z.string().min(1)).min(1),
    conclusion: z.string().min(1),
})

export type DraftOutput = z.infer<typeof draftOutputSchema>

export const feedbackItemSchema = z.object({
    section: z.string().min(1),
    issue: z.string().min(1),
    suggestion: z.string().min(1),
    severity: z.enum(["minor", "moderate", "major"]),
})

export const critiqueOutputSchema = z.object({
    overallQuality: z.number().min(0).max(10),
    items: z.array(feedbackItemSchema),
    approval: z.enum(["approved", "needs_revision"]),
    summary: z.string().min(1),
})

export type CritiqueOutput = z.infer<typeof critiqueOutputSchema>
