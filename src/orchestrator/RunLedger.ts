import { randomUUID } from "node:crypto"

import { z } from "zod"

import { renderDraftMarkdown } from "../output/markdown.js"
import type { FileStore } from "../persistence/FileStore.js"
import type { Draft } from "../types.js"
import type { WorkflowResult } from "../workflow/WorkflowCoordinator.js"

const runStatusSchema = z.enum(["pending", "in_progress", "completed", "failed"])

export type RunStatus = z.infer<typeof runStatusSchema>

const runSummarySchema = z.object({
    status: z.enum(["completed", "failed"]),
    iterations: z.number(),
    qualityScore: z.number().nullable(),
    bestEffort: z.boolean(),
    degradedResearch: z.boolean(),
    elapsedMs: z.number(),
    costUnits: z.number(),
    errorCode: z.string().optional(),
    errorMessage: z.string().optional(),
})

export type RunSummary = z.infer<typeof runSummarySchema>

export const runRecordSchema = z.object({
    id: z.string(),
    topic: z.string(),
    status: runStatusSchema,
    /** Draft documents, in the order they were written. */
    drafts: z.array(z.string()),
    output: z.string().optional(),
    summary: runSummarySchema.optional(),
    createdAt: z.string(),
    updatedAt: z.string(),
})

export type RunRecord = z.infer<typeof runRecordSchema>

export function summarizeResult(result: WorkflowResult): RunSummary {
    return {
        status: result.status,
        iterations: result.iterations,
        qualityScore: result.qualityScore,
        bestEffort: result.bestEffort,
        degradedResearch: result.degradedResearch,
        elapsedMs: result.elapsedMs,
        costUnits: result.metrics.costUnits,
        errorCode: result.error?.code,
        errorMessage: result.error?.message,
    }
}

/** Persists one record per run, plus every draft and the final Markdown. */
export class RunLedger {
    private readonly store: FileStore
    private readonly runs: Map<string, RunRecord> = new Map()

    constructor(store: FileStore) {
        this.store = store
    }

    public async create(topic: string): Promise<RunRecord> {
        const now = new Date().toISOString()
        const run: RunRecord = {
            id: randomUUID(),
            topic,
            status: "pending",
            drafts: [],
            createdAt: now,
            updatedAt: now,
        }
        this.runs.set(run.id, run)
        await this.persist(run)
        return run
    }

    public get(id: string): RunRecord | undefined {
        return this.runs.get(id)
    }

    public async updateStatus(
        id: string,
        status: RunStatus
    ): Promise<RunRecord | undefined> {
        const run = this.runs.get(id)
        if (!run) return undefined
        run.status = status
        run.updatedAt = new Date().toISOString()
        await this.persist(run)
        return run
    }

    public async addDraft(
        id: string,
        draft: Draft,
        iteration: number
    ): Promise<void> {
        const run = this.runs.get(id)
        if (!run) return
        const key = `runs/${id}/draft-${run.drafts.length + 1}`
        await this.store.write(key, { iteration, ...draft })
        run.drafts.push(key)
        run.updatedAt = new Date().toISOString()
        await this.persist(run)
    }

    public async complete(id: string, result: WorkflowResult): Promise<void> {
        const run = this.runs.get(id)
        if (!run) return
        if (result.draft) {
            run.output = await this.store.writeText(
                `runs/${id}/final.md`,
                renderDraftMarkdown(result.draft, {
                    includeSources: true,
                    research: result.research,
                })
            )
        }
        run.status = result.status
        run.summary = summarizeResult(result)
        run.updatedAt = new Date().toISOString()
        await this.persist(run)
    }

    public async load(id: string): Promise<RunRecord | null> {
        const existing = this.runs.get(id)
        if (existing) return existing
        const loaded = await this.store.read(`runs/${id}`, runRecordSchema)
        if (loaded) {
            this.runs.set(id, loaded)
        }
        return loaded
    }

    private async persist(run: RunRecord): Promise<void> {
        await this.store.write(`runs/${run.id}`, run)
    }
}
