import { createLLMExecutors, type AgentBinding } from "../agents/index.js"
import { minimalResearchFallback } from "../agents/fallback.js"
import { getDefaultModel, resolveLimits } from "../core/Config.js"
import { ConfigError, InvalidTopicError, toError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import { ProgressPublisher } from "../events/ProgressPublisher.js"
import { createLLMProvider } from "../llm/index.js"
import { UsageAggregator } from "../metrics/UsageAggregator.js"
import { FileStore } from "../persistence/FileStore.js"
import { createRenderer } from "../renderer/index.js"
import type {
    ExecutorRole,
    FoundryConfig,
    LLMProvider,
    LLMProviderType,
    RevisionLimits,
    StageExecutors,
} from "../types.js"
import {
    WorkflowCoordinator,
    type WorkflowResult,
} from "../workflow/WorkflowCoordinator.js"
import { RunLedger } from "./RunLedger.js"

const PROVIDER_TYPES: readonly LLMProviderType[] = ["openai", "anthropic"]

export interface GenerateOptions {
    signal?: AbortSignal
    /** Caller-owned stream, so observers can subscribe before the run starts. */
    publisher?: ProgressPublisher
}

interface RunPlan {
    topic: string
    limits: RevisionLimits
    executors: StageExecutors
}

export interface RunResult extends WorkflowResult {
    /** Ledger id when persistence is enabled. */
    runId: string | null
}

/**
 * Wires configuration into runs. Provider clients are shared across
 * runs; every run gets its own coordinator, publisher, aggregator and
 * renderer, so independent runs may overlap.
 */
export class Orchestrator {
    private readonly config: FoundryConfig
    private readonly providers: Partial<Record<LLMProviderType, LLMProvider>> =
        {}
    private readonly ledger: RunLedger | null
    private readonly active: Set<AbortController> = new Set()

    constructor(config: FoundryConfig) {
        this.config = config

        if (config.providers && Object.keys(config.providers).length > 0) {
            Object.assign(this.providers, config.providers)
        } else {
            if (config.openaiApiKey) {
                this.providers.openai = createLLMProvider(
                    "openai",
                    config.openaiApiKey
                )
            }
            if (config.anthropicApiKey) {
                this.providers.anthropic = createLLMProvider(
                    "anthropic",
                    config.anthropicApiKey
                )
            }
        }

        this.ledger = config.persistencePath
            ? new RunLedger(new FileStore(config.persistencePath))
            : null
    }

    public async generate(
        topic: string,
        limits?: Partial<RevisionLimits>,
        options: GenerateOptions = {}
    ): Promise<RunResult> {
        const publisher = options.publisher ?? new ProgressPublisher()
        let plan: RunPlan
        try {
            plan = this.prepare(topic, limits)
        } catch (error) {
            publisher.close()
            throw error
        }
        const { topic: trimmed, limits: resolved, executors } = plan

        const controller = new AbortController()
        const onOuterAbort = (): void => controller.abort()
        if (options.signal?.aborted) controller.abort()
        options.signal?.addEventListener("abort", onOuterAbort, { once: true })
        this.active.add(controller)

        const aggregator = new UsageAggregator()
        const renderer = createRenderer(this.config.renderer ?? "terminal", {
            verbose: this.config.verbose ?? false,
        })
        renderer?.attach(publisher)

        const budget = this.config.budgetCostUnits
        if (budget !== undefined) {
            publisher.on(() => {
                if (!controller.signal.aborted && aggregator.costUnits >= budget) {
                    log.app(
                        "Budget of %d cost units reached, aborting run",
                        budget
                    )
                    controller.abort()
                }
            })
        }

        let runId: string | null = null
        try {
            const run = await this.recordRun("create", () =>
                this.ledger ? this.ledger.create(trimmed) : Promise.resolve(null)
            )
            runId = run?.id ?? null
            const ledger = run ? this.ledger : null
            const coordinator = new WorkflowCoordinator({
                publisher,
                aggregator,
                signal: controller.signal,
                researchFallback: this.config.degradedResearch
                    ? minimalResearchFallback
                    : undefined,
                retainDrafts: this.config.retainDrafts ?? false,
                onDraft:
                    ledger && run
                        ? (draft, iteration) =>
                              ledger.addDraft(run.id, draft, iteration)
                        : undefined,
            })

            if (ledger && run) {
                await this.recordRun("status update", () =>
                    ledger.updateStatus(run.id, "in_progress")
                )
            }
            const result = await coordinator.run(trimmed, executors, resolved)
            if (ledger && run) {
                await this.recordRun("completion", () =>
                    ledger.complete(run.id, result)
                )
            }
            return { ...result, runId }
        } catch (error) {
            log.app("Run failed: %s", toError(error).message)
            const ledger = this.ledger
            const failedId = runId
            if (ledger && failedId) {
                await this.recordRun("status update", () =>
                    ledger.updateStatus(failedId, "failed")
                )
            }
            throw error
        } finally {
            publisher.close()
            renderer?.detach()
            options.signal?.removeEventListener("abort", onOuterAbort)
            this.active.delete(controller)
        }
    }

    /** Cancels every run in flight. */
    public abort(): void {
        for (const controller of this.active) {
            controller.abort()
        }
    }

    /** Validates the request; throws before any run state exists. */
    private prepare(
        topic: string,
        limits: Partial<RevisionLimits> | undefined
    ): RunPlan {
        const trimmed = topic.trim()
        if (!trimmed) throw new InvalidTopicError(topic)
        const resolved = resolveLimits(this.config.limits, limits)
        return {
            topic: trimmed,
            limits: resolved,
            executors: this.buildExecutors(resolved),
        }
    }

    /**
     * Ledger writes never decide a run's outcome: a failed write is
     * logged and the run carries on without it.
     */
    private async recordRun<T>(
        action: string,
        write: () => Promise<T>
    ): Promise<T | null> {
        try {
            return await write()
        } catch (error) {
            log.persistence(
                "Run ledger %s failed: %s",
                action,
                toError(error).message
            )
            return null
        }
    }

    private buildExecutors(limits: RevisionLimits): StageExecutors {
        const custom = this.config.executors ?? {}
        if (custom.research && custom.writing && custom.critique) {
            return {
                research: custom.research,
                writing: custom.writing,
                critique: custom.critique,
            }
        }
        const defaults = createLLMExecutors({
            research: this.bind("research"),
            writing: this.bind("writing"),
            critique: this.bind("critique"),
            qualityThreshold: limits.qualityThreshold,
        })
        return {
            research: custom.research ?? defaults.research,
            writing: custom.writing ?? defaults.writing,
            critique: custom.critique ?? defaults.critique,
        }
    }

    private bind(role: ExecutorRole): AgentBinding {
        const modelOverride =
            role === "critique"
                ? (this.config.criticModel ?? this.config.defaultModel)
                : this.config.defaultModel
        const model = getDefaultModel(
            role,
            this.config.defaultProvider,
            modelOverride
        )
        const provider = this.providers[model.provider]
        if (provider) return { provider, model }

        const fallbackType = PROVIDER_TYPES.find((type) => this.providers[type])
        const fallback = fallbackType ? this.providers[fallbackType] : undefined
        if (!fallbackType || !fallback) {
            throw new ConfigError(
                "No LLM provider configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY."
            )
        }
        log.app(
            "Provider %s unavailable for %s, falling back to %s",
            model.provider,
            role,
            fallbackType
        )
        return { provider: fallback, model: getDefaultModel(role, fallbackType) }
    }
}
