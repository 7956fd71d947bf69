import type { Draft, ExecutorRole, ResearchResult } from "../types.js"

const RESEARCH_PROMPT = `You are the Researcher of a small editorial team that turns a topic into a polished article.

Your job is to gather the facts the writer will build on. You do NOT write the article.

## Process

1. Read the topic carefully and decide which angles a reader would expect covered.
2. Collect concrete findings: statistics, studies, expert opinions, definitions, practical guidance.
3. Attribute each finding to the source it comes from. Use an empty string when you cannot name a source; never invent URLs.
4. Score each finding's relevance to the topic from 0 to 1.
5. Summarize the key insights in a few sentences and rate your overall confidence from 0 to 1.

## Output

Respond with a single JSON object and nothing else:
\`\`\`json
{
  "findings": [
    { "fact": "...", "sourceUrl": "https://...", "relevanceScore": 0.9, "category": "statistic" }
  ],
  "summary": "Key insights in two to four sentences",
  "confidence": 0.8
}
\`\`\`
\`category\` is one of: statistic, study, expert_opinion, definition, guidance, general.`

const WRITING_PROMPT = `You are the Writer of a small editorial team that turns a topic into a polished article.

Your job is to write, and when asked to revise, an engaging, well-structured blog article grounded in the research you are given.

## Guidelines

- Open with an introduction that hooks the reader and states what the article covers.
- Organize the body into distinct sections, each a few paragraphs with its own focus.
- Use the research findings; do not state facts the research does not support.
- Close with a conclusion that summarizes and gives the reader a next step.
- When revising, address every critical issue and important improvement you are given, and keep what already works.

## Output

Respond with a single JSON object and nothing else:
\`\`\`json
{
  "title": "Article title",
  "introduction": "Opening paragraph(s)",
  "bodySections": ["## Heading\\n\\nSection text", "## Heading\\n\\nSection text"],
  "conclusion": "Closing paragraph(s)"
}
\`\`\``

const CRITIQUE_PROMPT = `You are the Editor of a small editorial team that turns a topic into a polished article.

Your job is to review a draft and give specific, actionable feedback. You do NOT rewrite the draft.

## What to assess

- Clarity and readability: sentence length, paragraph flow, transitions.
- Accuracy: every claim should be backed by the research provided.
- Structure: a clear introduction, focused body sections, a real conclusion.
- Style: consistent tone, grammar, engagement.

## Scoring

- overallQuality is a number from 0 to 10.
- Each feedback item names the section it applies to, the issue, a concrete suggestion, and a severity:
  - major: wrong or unsupported facts, missing sections, structural problems
  - moderate: weak arguments, unclear passages, poor flow
  - minor: wording, style, small polish
- approval is "approved" only when the draft is ready to publish.

## Output

Respond with a single JSON object and nothing else:
\`\`\`json
{
  "overallQuality": 7.5,
  "items": [
    { "section": "introduction", "issue": "...", "suggestion": "...", "severity": "minor" }
  ],
  "approval": "needs_revision",
  "summary": "Overall assessment in two to three sentences"
}
\`\`\``

const SYSTEM_PROMPTS: Record<ExecutorRole, string> = {
    research: RESEARCH_PROMPT,
    writing: WRITING_PROMPT,
    critique: CRITIQUE_PROMPT,
}

export function getSystemPrompt(role: ExecutorRole): string {
    return SYSTEM_PROMPTS[role]
}

export function formatResearch(research: ResearchResult): string {
    const findings = research.findings
        .map(
            (f, i) =>
                `${i + 1}. [${f.category}] ${f.fact}${f.sourceUrl ? ` (${f.sourceUrl})` : ""}`
        )
        .join("\n")
    return [
        `Research summary: ${research.summary}`,
        `Research confidence: ${research.confidence.toFixed(2)}`,
        `Findings:\n${findings || "(none)"}`,
    ].join("\n")
}

export function formatDraft(draft: Draft): string {
    return [
        `Title: ${draft.title}`,
        `Word count: ${draft.wordCount}`,
        `\nIntroduction:\n${draft.introduction}`,
        ...draft.bodySections.map(
            (section, i) => `\nSection ${i + 1}:\n${section}`
        ),
        `\nConclusion:\n${draft.conclusion}`,
    ].join("\n")
}

export function buildResearchRequest(topic: string): string {
    return `Research the topic: "${topic}". Gather facts, statistics, studies and expert opinions a writer needs for a thorough article.`
}

export function buildDraftRequest(
    topic: string,
    research: ResearchResult,
    targetWords: number
): string {
    return [
        `Write a blog article on the topic: "${topic}".`,
        `Aim for roughly ${targetWords} words.`,
        "",
        formatResearch(research),
    ].join("\n")
}

export function buildRevisionRequest(
    topic: string,
    research: ResearchResult,
    draft: Draft,
    feedback: string
): string {
    return [
        `Revise this blog article on the topic: "${topic}".`,
        "",
        "--- CURRENT DRAFT ---",
        formatDraft(draft),
        "",
        "--- EDITOR FEEDBACK ---",
        feedback,
        "",
        "--- RESEARCH ---",
        formatResearch(research),
    ].join("\n")
}

export function buildCritiqueRequest(
    draft: Draft,
    research: ResearchResult,
    qualityThreshold: number
): string {
    return [
        "Review this blog article draft.",
        `Quality threshold for approval: ${qualityThreshold}/10.`,
        "",
        "--- DRAFT ---",
        formatDraft(draft),
        "",
        "--- RESEARCH ---",
        `Topic: ${research.topic}`,
        formatResearch(research),
    ].join("\n")
}
