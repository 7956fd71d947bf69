import { describe, expect, it, vi } from "vitest"

import { ProgressPublisher } from "../../events/ProgressPublisher.js"
import type { ProgressEvent } from "../../events/types.js"

function event(message: string, percent = 0): ProgressEvent {
    return {
        timestamp: 0,
        stage: "writing",
        agent: "writing",
        status: "working",
        message,
        percent,
    }
}

async function drain(iterable: AsyncIterable<ProgressEvent>): Promise<string[]> {
    const messages: string[] = []
    for await (const e of iterable) {
        messages.push(e.message)
    }
    return messages
}

describe("ProgressPublisher", () => {
    it("publishes with no subscribers", () => {
        const publisher = new ProgressPublisher()
        publisher.publish(event("lonely"))
        expect(publisher.subscriberCount).toBe(0)
        expect(publisher.latest()?.message).toBe("lonely")
    })

    it("delivers events in order and ends after close", async () => {
        const publisher = new ProgressPublisher()
        const subscription = publisher.subscribe()
        publisher.publish(event("a"))
        publisher.publish(event("b"))
        publisher.close()
        publisher.publish(event("late"))

        expect(await drain(subscription)).toEqual(["a", "b"])
    })

    it("wakes a waiting reader", async () => {
        const publisher = new ProgressPublisher()
        const subscription = publisher.subscribe()
        const pending = subscription.next()
        publisher.publish(event("first"))
        const result = await pending
        expect(result.done).toBe(false)
        expect(result.value?.message).toBe("first")
    })

    it("drops the oldest events for a reader that falls behind", async () => {
        const publisher = new ProgressPublisher({ bufferSize: 3 })
        const slow = publisher.subscribe()
        for (let i = 0; i < 1000; i++) {
            publisher.publish(event(`e${i}`))
        }
        publisher.close()

        expect(slow.dropped).toBe(997)
        expect(await drain(slow)).toEqual(["e997", "e998", "e999"])
    })

    it("keeps every event for a reader with room", async () => {
        const publisher = new ProgressPublisher({ bufferSize: 3 })
        const stalled = publisher.subscribe()
        const keeping = publisher.subscribe()
        const received: string[] = []
        const reading = (async () => {
            for await (const e of keeping) received.push(e.message)
        })()

        publisher.publish(event("x"))
        await Promise.resolve()
        publisher.publish(event("y"))
        publisher.close()
        await reading

        expect(received).toEqual(["x", "y"])
        expect(stalled.pending).toBe(2)
    })

    it("isolates a listener that throws", () => {
        const publisher = new ProgressPublisher()
        const good = vi.fn()
        publisher.on(() => {
            throw new Error("renderer broke")
        })
        publisher.on(good)

        expect(() => publisher.publish(event("ok"))).not.toThrow()
        expect(good).toHaveBeenCalledTimes(1)
    })

    it("stops calling a listener after off", () => {
        const publisher = new ProgressPublisher()
        const listener = vi.fn()
        publisher.on(listener)
        publisher.publish(event("one"))
        publisher.off(listener)
        publisher.publish(event("two"))
        expect(listener).toHaveBeenCalledTimes(1)
    })

    it("removes a subscription that returns early", async () => {
        const publisher = new ProgressPublisher()
        const subscription = publisher.subscribe()
        expect(publisher.subscriberCount).toBe(1)
        await subscription.return()
        expect(publisher.subscriberCount).toBe(0)
        expect(subscription.closed).toBe(true)
    })

    it("ends a subscription opened after close at once", async () => {
        const publisher = new ProgressPublisher()
        publisher.close()
        expect(await drain(publisher.subscribe())).toEqual([])
    })

    it("notifies close handlers once", () => {
        const publisher = new ProgressPublisher()
        const onClose = vi.fn()
        publisher.onClose(onClose)
        publisher.close()
        publisher.close()
        expect(onClose).toHaveBeenCalledTimes(1)
        expect(publisher.isClosed).toBe(true)
    })
})
