#!/usr/bin/env node

import { readFile, writeFile } from "node:fs/promises"
import { join, resolve } from "node:path"

import { Command, InvalidArgumentError, Option } from "commander"
import { z } from "zod"

import { partialLimitsSchema } from "./core/Config.js"
import { ConfigError, toError } from "./core/errors.js"
import { log } from "./core/Logger.js"
import { formatCost } from "./core/Pricing.js"
import { DraftFoundry } from "./index.js"
import type { RunResult } from "./orchestrator/Orchestrator.js"
import { renderDraftMarkdown } from "./output/markdown.js"
import type { FoundryConfig, RevisionLimits } from "./types.js"

const RC_FILE = ".foundryrc.json"

const providerSchema = z.enum(["openai", "anthropic"])
const rendererSchema = z.enum(["terminal", "log", "none"])

const rcSchema = z
    .object({
        openaiApiKey: z.string(),
        anthropicApiKey: z.string(),
        defaultProvider: providerSchema,
        defaultModel: z.string(),
        criticModel: z.string(),
        renderer: rendererSchema,
        verbose: z.boolean(),
        persistencePath: z.string(),
        degradedResearch: z.boolean(),
        retainDrafts: z.boolean(),
        budgetCostUnits: z.number().positive(),
        limits: partialLimitsSchema,
    })
    .partial()
    .strict()

type RcConfig = z.infer<typeof rcSchema>

const cliSchema = z.object({
    maxIterations: z.number().optional(),
    qualityThreshold: z.number().optional(),
    timeout: z.number().optional(),
    maxRetries: z.number().optional(),
    provider: providerSchema.optional(),
    model: z.string().optional(),
    criticModel: z.string().optional(),
    renderer: rendererSchema.optional(),
    output: z.string().optional(),
    persist: z.string().optional(),
    degradedResearch: z.boolean().optional(),
    budget: z.number().optional(),
    cwd: z.string().optional(),
    verbose: z.boolean().optional(),
})

type CliOptions = z.infer<typeof cliSchema>

function parseInteger(value: string): number {
    const parsed = Number(value)
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError("Not an integer.")
    }
    return parsed
}

function parseNumber(value: string): number {
    const parsed = Number(value)
    if (!Number.isFinite(parsed)) {
        throw new InvalidArgumentError("Not a number.")
    }
    return parsed
}

function isNotFound(error: unknown): boolean {
    return (
        error instanceof Error && "code" in error && error.code === "ENOENT"
    )
}

async function readOptionalFile(path: string): Promise<string | null> {
    try {
        return await readFile(path, "utf-8")
    } catch (error) {
        if (isNotFound(error)) return null
        throw error
    }
}

/** KEY=value lines; variables already set in the environment win. */
async function loadEnvFile(cwd: string): Promise<void> {
    const content = await readOptionalFile(join(cwd, ".env"))
    if (content === null) return
    for (const line of content.split("\n")) {
        const trimmed = line.replace(/^export\s+/, "").trim()
        if (!trimmed || trimmed.startsWith("#")) continue
        const eqIndex = trimmed.indexOf("=")
        if (eqIndex === -1) continue
        const key = trimmed.slice(0, eqIndex).trim()
        const value = trimmed
            .slice(eqIndex + 1)
            .trim()
            .replace(/^(["'])(.*)\1$/, "$2")
        if (process.env[key] === undefined) process.env[key] = value
    }
}

async function loadRcConfig(cwd: string): Promise<RcConfig> {
    const rcPath = join(cwd, RC_FILE)
    const content = await readOptionalFile(rcPath)
    if (content === null) return {}
    let raw: unknown
    try {
        raw = JSON.parse(content)
    } catch (parseError) {
        throw new ConfigError(
            `Invalid JSON in ${rcPath}: ${toError(parseError).message}`
        )
    }
    const parsed = rcSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigError(
            `Invalid ${RC_FILE}: ${parsed.error.issues
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; ")}`
        )
    }
    return parsed.data
}

function envProvider(): FoundryConfig["defaultProvider"] {
    const value = process.env.FOUNDRY_PROVIDER
    if (!value) return undefined
    const parsed = providerSchema.safeParse(value)
    if (!parsed.success) {
        throw new ConfigError(
            `FOUNDRY_PROVIDER must be openai or anthropic, got "${value}"`
        )
    }
    return parsed.data
}

function buildConfig(
    options: CliOptions,
    rc: RcConfig,
    workingDirectory: string
): FoundryConfig {
    return {
        openaiApiKey: process.env.OPENAI_API_KEY ?? rc.openaiApiKey,
        anthropicApiKey: process.env.ANTHROPIC_API_KEY ?? rc.anthropicApiKey,
        workingDirectory,
        persistencePath: options.persist
            ? resolve(workingDirectory, options.persist)
            : rc.persistencePath,
        defaultProvider: options.provider ?? envProvider() ?? rc.defaultProvider,
        defaultModel:
            options.model ?? process.env.FOUNDRY_MODEL ?? rc.defaultModel,
        criticModel: options.criticModel ?? rc.criticModel,
        renderer: options.renderer ?? rc.renderer ?? "terminal",
        verbose: options.verbose ?? rc.verbose ?? false,
        limits: rc.limits,
        degradedResearch:
            options.degradedResearch ?? rc.degradedResearch ?? false,
        retainDrafts: rc.retainDrafts,
        budgetCostUnits: options.budget ?? rc.budgetCostUnits,
    }
}

function cliLimits(options: CliOptions): Partial<RevisionLimits> {
    return {
        maxIterations: options.maxIterations,
        qualityThreshold: options.qualityThreshold,
        stageTimeoutMs:
            options.timeout !== undefined ? options.timeout * 1000 : undefined,
        maxRetries: options.maxRetries,
    }
}

function printSummary(result: RunResult): void {
    const metrics = result.metrics
    console.log(`\nStatus:     ${result.status}`)
    console.log(`Iterations: ${result.iterations}`)
    console.log(
        `Quality:    ${result.qualityScore === null ? "n/a" : result.qualityScore.toFixed(1)}`
    )
    console.log(`Elapsed:    ${(result.elapsedMs / 1000).toFixed(1)}s`)
    console.log(
        `Cost:       ${formatCost(metrics.costUnits)}  (${metrics.tokens.totalTokens} tokens)`
    )
    if (result.draft) {
        console.log(
            `Draft:      "${result.draft.title}" (${result.draft.wordCount} words)`
        )
    }
    if (result.bestEffort) {
        console.log("Note:       iteration budget ran out; this is a best-effort draft")
    }
    if (result.degradedResearch) {
        console.log("Note:       research failed; the draft was written without it")
    }
    if (result.runId) {
        console.log(`Run:        ${result.runId}`)
    }
    if (result.error) {
        console.error(`\nReason: ${result.error.message}`)
    }
}

const program = new Command()

program
    .name("foundry")
    .description("Research, draft and refine articles with a team of LLM agents")
    .version("0.1.0")

program
    .command("generate")
    .description("Generate an article on a topic")
    .argument("<topic>", "Topic to write about")
    .option("--max-iterations <n>", "Maximum critique cycles", parseInteger)
    .option(
        "--quality-threshold <score>",
        "Quality score (0-10) that accepts a draft",
        parseNumber
    )
    .option("--timeout <seconds>", "Per-attempt stage timeout", parseNumber)
    .option("--max-retries <n>", "Retries per stage call", parseInteger)
    .addOption(
        new Option("--provider <provider>", "LLM provider for every agent").choices(
            providerSchema.options
        )
    )
    .option("--model <model>", "Model for every agent")
    .option("--critic-model <model>", "Model for the critique agent")
    .addOption(
        new Option("--renderer <type>", "Progress output").choices(
            rendererSchema.options
        )
    )
    .option("--output <file>", "Write the final draft as Markdown")
    .option("--persist <dir>", "Record runs and drafts under this directory")
    .option(
        "--degraded-research",
        "Continue with minimal research when the research stage fails"
    )
    .option("--budget <units>", "Abort once estimated spend reaches this (USD)", parseNumber)
    .option("--cwd <path>", "Working directory (defaults to current directory)")
    .option("--verbose", "Show recent agent messages in the live view")
    .action(async (topic: string, rawOptions: unknown) => {
        const parsedOptions = cliSchema.safeParse(rawOptions)
        if (!parsedOptions.success) {
            throw new ConfigError(
                `Invalid options: ${parsedOptions.error.issues
                    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                    .join("; ")}`
            )
        }
        const options = parsedOptions.data
        const workingDirectory = options.cwd
            ? resolve(options.cwd)
            : process.cwd()

        await loadEnvFile(workingDirectory)
        const rc = await loadRcConfig(workingDirectory)
        const config = buildConfig(options, rc, workingDirectory)

        if (!config.openaiApiKey && !config.anthropicApiKey) {
            throw new ConfigError(
                `No API keys found. Set OPENAI_API_KEY or ANTHROPIC_API_KEY, add them to .env, or configure ${RC_FILE}`
            )
        }
        log.app(
            "provider: %s | model: %s | renderer: %s",
            config.defaultProvider ?? "per-role default",
            config.defaultModel ?? "per-role default",
            config.renderer
        )

        const foundry = new DraftFoundry(config)
        process.on("SIGINT", () => {
            foundry.abort()
        })

        const result = await foundry.generate(topic, cliLimits(options))

        if (options.output && result.draft) {
            const outputPath = resolve(workingDirectory, options.output)
            await writeFile(
                outputPath,
                renderDraftMarkdown(result.draft, {
                    includeSources: true,
                    research: result.research,
                }),
                "utf-8"
            )
            log.app("Wrote %s", outputPath)
        }

        if (config.renderer === "none") {
            console.log(JSON.stringify(result, null, 2))
        } else {
            printSummary(result)
        }
        process.exit(result.status === "completed" ? 0 : 1)
    })

program.parseAsync().catch((error: unknown) => {
    console.error("Fatal error:", toError(error).message)
    process.exit(1)
})
