import { access, mkdir, readFile, rename, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

import type { z } from "zod"

import { FoundryError, toError } from "../core/errors.js"
import { log } from "../core/Logger.js"

export class PersistenceError extends FoundryError {
    constructor(message: string, key: string, cause?: Error) {
        super(message, "PERSISTENCE_ERROR", cause, { key })
        this.name = "PersistenceError"
    }
}

function isNotFound(error: unknown): boolean {
    return (
        error instanceof Error && "code" in error && error.code === "ENOENT"
    )
}

/**
 * JSON documents and text files under one base directory. Writes go to
 * a temp file first and are renamed into place.
 */
export class FileStore {
    private readonly basePath: string

    constructor(basePath: string) {
        this.basePath = basePath
    }

    public async write(key: string, data: unknown): Promise<void> {
        await this.writeFileAtomic(
            key,
            this.keyToPath(key),
            JSON.stringify(data, null, 2)
        )
    }

    /** Writes `content` verbatim to `name`, relative to the base path. */
    public async writeText(name: string, content: string): Promise<string> {
        const filePath = join(this.basePath, name)
        await this.writeFileAtomic(name, filePath, content)
        return filePath
    }

    public async read<S extends z.ZodTypeAny>(
        key: string,
        schema: S
    ): Promise<z.infer<S> | null> {
        const filePath = this.keyToPath(key)
        let content: string
        try {
            content = await readFile(filePath, "utf-8")
        } catch (error) {
            if (isNotFound(error)) return null
            log.persistence("Failed to read %s: %s", key, toError(error).message)
            throw error
        }

        let raw: unknown
        try {
            raw = JSON.parse(content)
        } catch (error) {
            throw new PersistenceError(
                `Invalid JSON in ${filePath}`,
                key,
                toError(error)
            )
        }
        const parsed = schema.safeParse(raw)
        if (!parsed.success) {
            throw new PersistenceError(
                `Unexpected content in ${filePath}: ${parsed.error.issues
                    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                    .join("; ")}`,
                key
            )
        }
        return parsed.data
    }

    public async exists(key: string): Promise<boolean> {
        try {
            await access(this.keyToPath(key))
            return true
        } catch (error) {
            if (isNotFound(error)) return false
            throw error
        }
    }

    private async writeFileAtomic(
        key: string,
        filePath: string,
        content: string
    ): Promise<void> {
        const tempPath = `${filePath}.tmp.${Date.now()}`
        await mkdir(dirname(filePath), { recursive: true })

        try {
            await writeFile(tempPath, content, "utf-8")
            await rename(tempPath, filePath)
        } catch (error) {
            log.persistence(
                "Failed to write %s: %s",
                key,
                toError(error).message
            )
            throw error
        }
    }

    private keyToPath(key: string): string {
        return join(this.basePath, `${key}.json`)
    }
}
