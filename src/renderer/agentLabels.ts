import type { AgentName } from "../types.js"

export const AGENT_LABELS: Record<AgentName, string> = {
    research: "Researcher",
    writing: "Writer",
    critique: "Editor",
    orchestrator: "Coordinator",
}

export function getAgentLabel(agent: AgentName): string {
    return AGENT_LABELS[agent]
}
