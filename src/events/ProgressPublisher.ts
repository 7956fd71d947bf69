import { EventEmitter } from "node:events"

import { log } from "../core/Logger.js"
import type { ProgressEvent, ProgressHandler } from "./types.js"

export const DEFAULT_BUFFER_SIZE = 256

type Done = IteratorReturnResult<undefined>

const DONE: Done = { value: undefined, done: true }

/**
 * One observer's view of the event stream. Events wait in a bounded
 * buffer; when it is full the oldest buffered event is dropped, so a
 * reader that falls behind loses history instead of slowing the writer.
 */
export class ProgressSubscription implements AsyncIterableIterator<ProgressEvent> {
    private readonly buffer: ProgressEvent[] = []
    private readonly waiters: ((result: IteratorResult<ProgressEvent, undefined>) => void)[] = []
    private finished = false
    private droppedCount = 0

    constructor(
        private readonly capacity: number,
        private readonly onLeave: (subscription: ProgressSubscription) => void
    ) {}

    public get dropped(): number {
        return this.droppedCount
    }

    public get pending(): number {
        return this.buffer.length
    }

    public get closed(): boolean {
        return this.finished
    }

    /** @internal called by the publisher */
    public push(event: ProgressEvent): void {
        if (this.finished) return
        const waiter = this.waiters.shift()
        if (waiter) {
            waiter({ value: event, done: false })
            return
        }
        if (this.buffer.length >= this.capacity) {
            this.buffer.shift()
            this.droppedCount++
        }
        this.buffer.push(event)
    }

    /** @internal publisher closed: buffered events still drain */
    public finish(): void {
        if (this.finished) return
        this.finished = true
        for (const waiter of this.waiters.splice(0)) {
            waiter(DONE)
        }
    }

    public next(): Promise<IteratorResult<ProgressEvent, undefined>> {
        const event = this.buffer.shift()
        if (event) return Promise.resolve({ value: event, done: false })
        if (this.finished) return Promise.resolve(DONE)
        return new Promise((resolve) => this.waiters.push(resolve))
    }

    /** Leave the stream; anything still buffered is discarded. */
    public return(): Promise<Done> {
        this.buffer.length = 0
        this.finish()
        this.onLeave(this)
        return Promise.resolve(DONE)
    }

    public [Symbol.asyncIterator](): this {
        return this
    }
}

export interface ProgressPublisherOptions {
    bufferSize?: number
}

/**
 * Fan-out of workflow progress. `publish` never blocks and never throws:
 * pull-based observers read through `subscribe()`, push-based ones
 * (renderers) register with `on()`.
 */
export class ProgressPublisher {
    private readonly emitter: EventEmitter = new EventEmitter()
    private readonly subscriptions: Set<ProgressSubscription> = new Set()
    private readonly listeners: Map<ProgressHandler, ProgressHandler> =
        new Map()
    private readonly bufferSize: number
    private closed = false
    private last: ProgressEvent | null = null

    constructor(options?: ProgressPublisherOptions) {
        this.bufferSize = Math.max(1, options?.bufferSize ?? DEFAULT_BUFFER_SIZE)
    }

    public get isClosed(): boolean {
        return this.closed
    }

    public get subscriberCount(): number {
        return this.subscriptions.size + this.listeners.size
    }

    public latest(): ProgressEvent | null {
        return this.last
    }

    public publish(event: ProgressEvent): void {
        if (this.closed) {
            log.progress("Dropping event after close: %s", event.message)
            return
        }
        this.last = event
        for (const subscription of this.subscriptions) {
            subscription.push(event)
        }
        this.emitter.emit("event", event)
    }

    public subscribe(): ProgressSubscription {
        const subscription = new ProgressSubscription(this.bufferSize, (s) =>
            this.subscriptions.delete(s)
        )
        if (this.closed) {
            subscription.finish()
        } else {
            this.subscriptions.add(subscription)
        }
        return subscription
    }

    public on(handler: ProgressHandler): void {
        if (this.listeners.has(handler)) return
        const guarded: ProgressHandler = (event) => {
            try {
                handler(event)
            } catch (error) {
                log.progress(
                    "Progress listener threw: %s",
                    error instanceof Error ? error.message : String(error)
                )
            }
        }
        this.listeners.set(handler, guarded)
        this.emitter.on("event", guarded)
    }

    public off(handler: ProgressHandler): void {
        const guarded = this.listeners.get(handler)
        if (!guarded) return
        this.emitter.off("event", guarded)
        this.listeners.delete(handler)
    }

    /** Ends every subscription once its buffer drains. Idempotent. */
    public close(): void {
        if (this.closed) return
        this.closed = true
        for (const subscription of this.subscriptions) {
            subscription.finish()
        }
        this.subscriptions.clear()
        this.emitter.emit("close")
    }

    public onClose(handler: () => void): void {
        this.emitter.once("close", handler)
    }
}
