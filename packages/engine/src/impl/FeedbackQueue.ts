/**
 * @fileoverview Feedback Queue
 *
 * Holds predictions whose ground truth has not been revealed yet.
 * Items leave the queue in enqueue order. Because the delay is normally
 * constant across a run, due iterations are non-decreasing and a prefix
 * drain is enough; no priority structure is needed.
 *
 * @module @bandit-router/engine/impl/FeedbackQueue
 */

import type { BinaryLabel, LabeledEvent } from "../contracts/LabeledEvent.js";

/**
 * A prediction waiting for its feedback.
 */
export interface PendingFeedback {
    /** Iteration at which the outcome becomes visible */
    readonly dueAtIteration: number;

    /** The scored event */
    readonly event: LabeledEvent;

    /** What the selected classifier predicted */
    readonly prediction: BinaryLabel;

    /** Which classifier made the prediction */
    readonly classifierName: string;
}

/**
 * FIFO queue of pending feedback.
 *
 * @example
 * ```typescript
 * const queue = new FeedbackQueue();
 * queue.enqueue(event, 1, "Model A", 5);
 *
 * queue.drainDue(4); // []
 * queue.drainDue(5); // [{ dueAtIteration: 5, ... }]
 * ```
 */
export class FeedbackQueue {
    private items: PendingFeedback[] = [];
    private head = 0;

    /**
     * Append a prediction to the back of the queue.
     */
    enqueue(
        event: LabeledEvent,
        prediction: BinaryLabel,
        classifierName: string,
        dueAtIteration: number
    ): PendingFeedback {
        const item: PendingFeedback = Object.freeze({
            dueAtIteration,
            event,
            prediction,
            classifierName,
        });

        this.items.push(item);
        return item;
    }

    /**
     * Remove and return every leading item due at or before `currentIteration`.
     *
     * Stops at the first item that is not yet due, even if a later item is.
     * That only happens after the delay is shortened mid-run.
     *
     * @param currentIteration - The iteration being processed
     * @returns Drained items in enqueue order
     */
    drainDue(currentIteration: number): PendingFeedback[] {
        const drained: PendingFeedback[] = [];

        for (let front = this.peek(); front && front.dueAtIteration <= currentIteration; front = this.peek()) {
            drained.push(front);
            this.head++;
        }

        this.compact();
        return drained;
    }

    /**
     * The front item, or undefined when empty.
     */
    peek(): PendingFeedback | undefined {
        return this.items[this.head];
    }

    /**
     * Items still waiting, front first.
     */
    pending(): readonly PendingFeedback[] {
        return this.items.slice(this.head);
    }

    /**
     * Number of items waiting.
     */
    get length(): number {
        return this.items.length - this.head;
    }

    // Drop consumed slots once they dominate the backing array
    private compact(): void {
        if (this.head > 0 && this.head * 2 >= this.items.length) {
            this.items = this.items.slice(this.head);
            this.head = 0;
        }
    }
}
