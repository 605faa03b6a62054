/**
 * EventSource Contract
 *
 * Event sources are passive generators. The engine pulls exactly one
 * event from its source per step.
 */

import type { LabeledEvent } from "./LabeledEvent.js";

/**
 * EventSource interface.
 *
 * @example
 * ```typescript
 * const alwaysFraud: EventSource = {
 *     id: "always-fraud",
 *     generate: () => createLabeledEvent(1, 1),
 * };
 * ```
 */
export interface EventSource {
    /** Unique identifier for this source */
    readonly id: string;

    /**
     * Produce the next event.
     * Called once per simulation step.
     */
    generate(): LabeledEvent;
}
