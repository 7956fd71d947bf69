import type { ProgressEvent } from "../events/types.js"

export function truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) return str
    return str.slice(0, maxLen - 1) + "…"
}

export function formatDuration(ms: number): string {
    const seconds = ms / 1000
    if (seconds < 60) return `${seconds.toFixed(1)}s`
    const minutes = Math.floor(seconds / 60)
    const remainingSeconds = Math.round(seconds % 60)
    return `${minutes}m${String(remainingSeconds).padStart(2, "0")}s`
}

export function formatTokenCount(tokens: number): string {
    if (tokens < 1000) return String(tokens)
    return `${(tokens / 1000).toFixed(1)}k`
}

export function formatElapsed(ms: number): string {
    const seconds = ms / 1000
    const minutes = Math.floor(seconds / 60)
    const secs = (seconds % 60).toFixed(1)
    return `${String(minutes).padStart(2, "0")}:${secs.padStart(4, "0")}`
}

/** Numeric metadata field, if the event carries one. */
export function metadataNumber(
    event: ProgressEvent,
    key: string
): number | undefined {
    const value = event.metadata?.[key]
    return typeof value === "number" && Number.isFinite(value)
        ? value
        : undefined
}
