/**
 * LabeledEvent Contract
 *
 * The unit of work that flows through the simulation. Each event carries
 * its ground-truth label so delayed feedback can be scored when it arrives.
 *
 * Events are immutable once created. Classifiers read them; the feedback
 * queue holds them until their outcome is revealed.
 */

/**
 * Binary ground truth or prediction.
 * 1 = positive (fraudulent), 0 = negative (legitimate).
 */
export type BinaryLabel = 0 | 1;

/**
 * A synthetic event with a ground-truth label.
 */
export interface LabeledEvent {
    /** Random identifier, for display only */
    readonly id: number;

    /** Ground truth */
    readonly label: BinaryLabel;
}

/**
 * Factory for a frozen LabeledEvent.
 *
 * @param id - Display identifier
 * @param label - Ground truth label
 * @returns Frozen event
 */
export function createLabeledEvent(id: number, label: BinaryLabel): LabeledEvent {
    return Object.freeze({ id, label });
}

/**
 * Type guard for binary labels.
 */
export function isBinaryLabel(value: unknown): value is BinaryLabel {
    return value === 0 || value === 1;
}
