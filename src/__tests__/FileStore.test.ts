import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { z } from "zod"

import { FileStore, PersistenceError } from "../persistence/FileStore.js"

const entrySchema = z.object({ name: z.string(), value: z.number() })

describe("FileStore", () => {
    let store: FileStore
    let tempDir: string

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), "foundry-test-"))
        store = new FileStore(tempDir)
    })

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true })
    })

    it("should write and read data", async () => {
        const data = { name: "test", value: 42 }
        await store.write("test-key", data)
        expect(await store.read("test-key", entrySchema)).toEqual(data)
    })

    it("should return null for non-existent keys", async () => {
        expect(await store.read("does-not-exist", entrySchema)).toBeNull()
    })

    it("should check existence correctly", async () => {
        expect(await store.exists("missing")).toBe(false)
        await store.write("present", { ok: true })
        expect(await store.exists("present")).toBe(true)
    })

    it("should handle nested keys", async () => {
        const data = { name: "nested", value: 1 }
        await store.write("runs/abc-123", data)
        expect(await store.read("runs/abc-123", entrySchema)).toEqual(data)
    })

    it("should overwrite existing data", async () => {
        await store.write("key", { name: "v", value: 1 })
        await store.write("key", { name: "v", value: 2 })
        const result = await store.read("key", entrySchema)
        expect(result?.value).toBe(2)
    })

    it("should reject content that does not match the schema", async () => {
        await store.write("key", { name: "v", value: "two" })
        await expect(store.read("key", entrySchema)).rejects.toBeInstanceOf(
            PersistenceError
        )
    })

    it("should reject a file that is not JSON", async () => {
        await writeFile(join(tempDir, "broken.json"), "{not json", "utf-8")
        await expect(store.read("broken", entrySchema)).rejects.toThrow(
            `Invalid JSON in ${join(tempDir, "broken.json")}`
        )
    })

    it("should write text files verbatim", async () => {
        const path = await store.writeText("runs/x/final.md", "# Title\n")
        expect(path).toBe(join(tempDir, "runs/x/final.md"))
        expect(await readFile(path, "utf-8")).toBe("# Title\n")
    })
})
