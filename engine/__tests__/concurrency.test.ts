import { describe, expect, it } from "vitest";

import { concurrentMap, concurrentSettle, createConcurrentRunContext } from "../concurrency";

function delay(ms: number) {
    return new Promise(resolve => setTimeout(resolve, ms));
}

describe("concurrentMap", () => {
    it("keeps input order and respects the slot limit", async () => {
        let active = 0;
        let maxActive = 0;
        const result = await concurrentMap([30, 10, 20, 5, 1], createConcurrentRunContext(2), async (ms, idx) => {
            active += 1;
            maxActive = Math.max(maxActive, active);
            await delay(ms);
            active -= 1;
            return `${idx}:${ms}`;
        });

        expect(result).toEqual(["0:30", "1:10", "2:20", "3:5", "4:1"]);
        expect(maxActive).toBe(2);
    });

    it("rejects with the failure and starts nothing after it", async () => {
        const started: number[] = [];
        const failing = concurrentMap([1, 2, 3, 4], createConcurrentRunContext(1), async n => {
            started.push(n);
            if (n === 2) {
                throw new Error("boom");
            }
            return n;
        });

        await expect(failing).rejects.toThrow("boom");
        expect(started).toEqual([1, 2]);
    });

    it("resolves empty input", async () => {
        expect(await concurrentMap([], createConcurrentRunContext(4), async (n: number) => n)).toEqual([]);
    });
});

describe("concurrentSettle", () => {
    it("collects every outcome unless told to stop", async () => {
        const outcomes = await concurrentSettle(["a", "b", "c"], createConcurrentRunContext(1), async s => {
            if (s === "b") {
                throw new Error(`bad ${s}`);
            }
            return s.toUpperCase();
        });

        expect(outcomes[0]).toEqual({ ok: true, value: "A" });
        expect(outcomes[1]).toEqual({ ok: false, error: new Error("bad b") });
        expect(outcomes[2]).toEqual({ ok: true, value: "C" });
    });

    it("leaves items never started undefined when stopping on error", async () => {
        const outcomes = await concurrentSettle(
            ["a", "b", "c"],
            createConcurrentRunContext(1),
            async s => {
                if (s === "a") {
                    throw new Error("first");
                }
                return s;
            },
            true
        );

        expect(outcomes).toHaveLength(3);
        expect(outcomes[0]).toMatchObject({ ok: false });
        expect(outcomes[1]).toBeUndefined();
        expect(outcomes[2]).toBeUndefined();
    });

    it("runs one job at a time when the job count is not a number", async () => {
        expect(createConcurrentRunContext(Number("abc")).freeSlots).toBe(1);
        expect(createConcurrentRunContext(0).freeSlots).toBe(1);

        const outcomes = await concurrentSettle([1, 2], createConcurrentRunContext(Number.NaN), async n => n * 2);

        expect(outcomes).toEqual([
            { ok: true, value: 2 },
            { ok: true, value: 4 }
        ]);
    });
});
