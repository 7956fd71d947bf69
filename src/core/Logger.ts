import createDebug from "debug"

const APP_PREFIX = "foundry"

/**
 * Create a namespaced logger instance.
 * All loggers are prefixed with the APP_PREFIX for easy filtering.
 *
 * @param namespace - The subsystem name (e.g., "workflow", "llm")
 * @returns A debug logger function
 */
export function createLogger(namespace: string): createDebug.Debugger {
    return createDebug(`${APP_PREFIX}:${namespace}`)
}

/**
 * Pre-defined loggers for the foundry subsystems.
 *
 * Usage:
 * ```typescript
 * import { log } from "./core/Logger.js"
 * log.workflow("Entering %s", stage)
 * log.llm("Response usage: %o", usage)
 * ```
 *
 * Enable via env: `DEBUG=foundry:*`
 * Enable specific: `DEBUG=foundry:workflow,foundry:stage`
 */
export const log = {
    app: createLogger("app"),
    workflow: createLogger("workflow"),
    stage: createLogger("stage"),
    progress: createLogger("progress"),
    llm: createLogger("llm"),
    persistence: createLogger("persistence"),
}
