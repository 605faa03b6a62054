/**
 * @fileoverview Unit tests for FeedbackQueue
 *
 * Tests cover:
 * - FIFO ordering
 * - Due-iteration boundary (due == current drains)
 * - Prefix drain stopping at the first item not yet due
 * - Read-only views: peek, pending, length
 *
 * @module @bandit-router/engine/__tests__/FeedbackQueue
 */

import { describe, it, expect, beforeEach } from "vitest";
import { FeedbackQueue } from "../impl/FeedbackQueue.js";
import { createLabeledEvent } from "../contracts/LabeledEvent.js";

describe("FeedbackQueue", () => {
    let queue: FeedbackQueue;

    beforeEach(() => {
        queue = new FeedbackQueue();
    });

    // Scenario: Items come out in enqueue order
    it("should drain items in FIFO order", () => {
        queue.enqueue(createLabeledEvent(10, 1), 1, "Model A", 3);
        queue.enqueue(createLabeledEvent(11, 0), 0, "Model B", 4);
        queue.enqueue(createLabeledEvent(12, 1), 0, "Model A", 5);

        const drained = queue.drainDue(5);

        expect(drained.map((item) => item.event.id)).toEqual([10, 11, 12]);
        expect(queue.length).toBe(0);
    });

    // Scenario: Nothing is returned before its due iteration
    it("should not return items that are not yet due", () => {
        queue.enqueue(createLabeledEvent(1, 1), 1, "Model A", 5);

        expect(queue.drainDue(4)).toEqual([]);
        expect(queue.length).toBe(1);
    });

    // Scenario: An item due exactly now is returned
    it("should return items due at the current iteration", () => {
        const item = queue.enqueue(createLabeledEvent(1, 1), 1, "Model A", 5);

        expect(queue.drainDue(5)).toEqual([item]);
    });

    // Scenario: Only the due prefix is removed
    it("should stop at the first item not yet due", () => {
        queue.enqueue(createLabeledEvent(1, 1), 1, "Model A", 2);
        queue.enqueue(createLabeledEvent(2, 1), 1, "Model A", 3);
        queue.enqueue(createLabeledEvent(3, 1), 1, "Model A", 4);

        const drained = queue.drainDue(3);

        expect(drained.map((item) => item.dueAtIteration)).toEqual([2, 3]);
        expect(queue.peek()?.event.id).toBe(3);
    });

    // Scenario: A later, earlier-due item waits behind a not-yet-due head
    it("should not skip ahead of a head that is not due", () => {
        queue.enqueue(createLabeledEvent(1, 1), 1, "Model A", 10);
        queue.enqueue(createLabeledEvent(2, 1), 1, "Model B", 2);

        expect(queue.drainDue(5)).toEqual([]);
        expect(queue.drainDue(10).map((item) => item.classifierName)).toEqual(["Model A", "Model B"]);
    });

    // Scenario: Enqueued items are frozen records
    it("should store the full pending record", () => {
        const event = createLabeledEvent(42, 1);
        const item = queue.enqueue(event, 0, "Model B", 7);

        expect(item).toEqual({
            dueAtIteration: 7,
            event,
            prediction    : 0,
            classifierName: "Model B",
        });
        expect(Object.isFrozen(item)).toBe(true);
    });

    // Scenario: Views reflect what is still waiting
    it("should expose pending items front first", () => {
        queue.enqueue(createLabeledEvent(1, 0), 0, "Model A", 1);
        queue.enqueue(createLabeledEvent(2, 0), 0, "Model A", 2);
        queue.enqueue(createLabeledEvent(3, 0), 0, "Model A", 3);
        queue.drainDue(1);

        expect(queue.pending().map((item) => item.event.id)).toEqual([2, 3]);
        expect(queue.length).toBe(2);
    });

    // Scenario: Empty queue
    it("should report an empty queue", () => {
        expect(queue.peek()).toBeUndefined();
        expect(queue.pending()).toEqual([]);
        expect(queue.drainDue(100)).toEqual([]);
    });

    // Scenario: Long interleaved use keeps order and count
    it("should stay consistent across many enqueue and drain cycles", () => {
        const seen: number[] = [];

        for (let i = 1; i <= 200; i++) {
            queue.enqueue(createLabeledEvent(i, 1), 1, "Model A", i + 3);
            seen.push(...queue.drainDue(i).map((item) => item.event.id));
        }

        expect(seen).toEqual(Array.from({ length: 197 }, (_, i) => i + 1));
        expect(queue.length).toBe(3);
        expect(queue.pending().map((item) => item.event.id)).toEqual([198, 199, 200]);
    });
});
