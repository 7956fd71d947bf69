import { describe, expect, it } from "vitest"

import { ProgressPublisher } from "../../events/ProgressPublisher.js"
import type { ProgressEvent } from "../../events/types.js"
import { formatProgressLine, LogRenderer } from "../../renderer/LogRenderer.js"

function event(overrides: Partial<ProgressEvent> = {}): ProgressEvent {
    return {
        timestamp: 1000,
        stage: "writing",
        agent: "writing",
        status: "working",
        message: "Writing Agent: working",
        percent: 40,
        ...overrides,
    }
}

describe("formatProgressLine", () => {
    it("lays out percent, stage, agent, status and message", () => {
        expect(formatProgressLine(event())).toBe(
            " 40%  writing       Writer       working    Writing Agent: working"
        )
    })

    it("appends the cost of a completed call", () => {
        const line = formatProgressLine(
            event({
                status: "completed",
                message: "Writing Agent: completed",
                metadata: { costUnits: 0.0075 },
            })
        )
        expect(line.endsWith("Writing Agent: completed  $0.0075")).toBe(true)
    })
})

describe("LogRenderer", () => {
    it("writes one line per event with time since the first", () => {
        const lines: string[] = []
        const publisher = new ProgressPublisher()
        new LogRenderer({ write: (line) => lines.push(line) }).attach(publisher)

        publisher.publish(event())
        publisher.publish(event({ timestamp: 62_500, agent: "critique", stage: "critiquing" }))

        expect(lines).toEqual([
            "[00:00.0]  40%  writing       Writer       working    Writing Agent: working",
            "[01:01.5]  40%  critiquing    Editor       working    Writing Agent: working",
        ])
    })

    it("detaches when the publisher closes", () => {
        const lines: string[] = []
        const publisher = new ProgressPublisher()
        new LogRenderer({ write: (line) => lines.push(line) }).attach(publisher)

        publisher.close()
        expect(publisher.subscriberCount).toBe(0)
    })
})
