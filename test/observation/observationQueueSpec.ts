import { AvailableEvent, MemoryTracer, ObservationQueue, QueueOverflowError, Trace } from "@src";
import * as fc from "fast-check";
import { Foo, ServerInstance } from "../serverModel";

describe("ObservationQueue", () => {
    const target = new ServerInstance("T1");
    let queue: ObservationQueue<AvailableEvent>;

    function event(value: number) {
        return new AvailableEvent(Foo, target, [value]);
    }

    beforeEach(() => {
        queue = new ObservationQueue<AvailableEvent>({ name: "event" });
    });

    it("should start empty", async () => {
        expect(queue.count).toBe(0);
        expect(queue.snapshot()).toEqual([]);
        expect(await queue.tryGet(0, true)).toBeNull();
    });

    it("should return observations in arrival order", async () => {
        const first = event(1);
        const second = event(2);
        const third = event(3);
        queue.add(first);
        queue.add(second);
        queue.add(third);

        expect(await queue.tryGet(0, true)).toBe(first);
        expect(await queue.tryGet(0, true)).toBe(second);
        expect(await queue.tryGet(0, true)).toBe(third);
        expect(queue.count).toBe(0);
    });

    it("should peek without removing", async () => {
        const first = event(1);
        queue.add(first);
        queue.add(event(2));

        expect(await queue.tryGet(0, false)).toBe(first);
        expect(await queue.tryGet(0, false)).toBe(first);
        expect(queue.count).toBe(2);
    });

    it("should give up after the timeout", async () => {
        const start = Date.now();

        const result = await queue.tryGet(30, false);

        expect(result).toBeNull();
        expect(Date.now() - start).toBeGreaterThanOrEqual(25);
    });

    it("should wake up as soon as an observation arrives", async () => {
        const arriving = event(7);
        const start = Date.now();
        setTimeout(() => queue.add(arriving), 20);

        const result = await queue.tryGet(5000, true);

        expect(result).toBe(arriving);
        expect(Date.now() - start).toBeLessThan(1000);
        expect(queue.count).toBe(0);
    });

    it("should wake a peeking consumer without removing the entry", async () => {
        const arriving = event(8);
        setTimeout(() => queue.add(arriving), 10);

        const result = await queue.tryGet(5000, false);

        expect(result).toBe(arriving);
        expect(queue.count).toBe(1);
    });

    it("should remove exactly the given observation", () => {
        const first = event(1);
        const second = event(2);
        queue.add(first);
        queue.add(second);

        expect(queue.remove(second)).toBe(true);
        expect(queue.remove(second)).toBe(false);
        expect(queue.snapshot()).toEqual([first]);
    });

    it("should return a snapshot that does not follow later changes", () => {
        queue.add(event(1));
        const snapshot = queue.snapshot();

        queue.add(event(2));

        expect(snapshot).toHaveLength(1);
        expect(queue.count).toBe(2);
    });

    it("should reject observations beyond its capacity", () => {
        const bounded = new ObservationQueue<AvailableEvent>({ name: "event", maxSize: 2 });
        bounded.add(event(1));
        bounded.add(event(2));

        expect(() => bounded.add(event(3))).toThrow(QueueOverflowError);
        expect(() => bounded.add(event(3))).toThrow("The event queue is full (capacity 2)");
        expect(bounded.count).toBe(2);
    });

    it("should count queued observations", () => {
        const tracer = new MemoryTracer();
        Trace.configure(tracer);

        queue.add(event(1));
        queue.add(event(2));

        expect(tracer.counters.get("event.queued")).toBe(2);
    });

    it("should drain any sequence in the order it was added", async () => {
        await fc.assert(fc.asyncProperty(fc.array(fc.integer(), { maxLength: 20 }), async values => {
            const q = new ObservationQueue<AvailableEvent>();
            const added = values.map(v => event(v));
            added.forEach(o => q.add(o));

            const peeked = await q.tryGet(0, false);
            expect(peeked).toBe(added.length > 0 ? added[0] : null);

            const drained: AvailableEvent[] = [];
            let next = await q.tryGet(0, true);
            while (next !== null) {
                drained.push(next);
                next = await q.tryGet(0, true);
            }
            expect(drained).toEqual(added);
        }));
    });
});
