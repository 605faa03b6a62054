/**
 * Classifier Contract
 *
 * Classifiers are the arms of the bandit. Each one receives an event and
 * returns a binary prediction. The engine never inspects how a prediction
 * was made; it only scores it once the event's feedback is due.
 *
 * Design principles:
 * - Read-only input: classifiers never mutate the event
 * - Drift: the recall rate can change between steps
 * - Named: the name is the key used by the bandit, metrics and logs
 */

import type { BinaryLabel, LabeledEvent } from "./LabeledEvent.js";

/**
 * Classifier interface.
 *
 * @example
 * ```typescript
 * const model: Classifier = new SyntheticClassifier("Model A", 0.8);
 * const prediction = model.predict(event); // 0 | 1
 * model.updateRecallRate(0.5);             // simulated drift
 * ```
 */
export interface Classifier {
    /** Unique name; doubles as the bandit arm key */
    readonly name: string;

    /** Probability of flagging a positive event */
    readonly recallRate: number;

    /**
     * Predict the label of an event.
     *
     * @param event - The event to evaluate (read-only)
     * @returns 1 if flagged as positive, else 0
     */
    predict(event: LabeledEvent): BinaryLabel;

    /**
     * Replace the recall rate. Applies to subsequent predictions.
     *
     * @param recallRate - New rate in [0, 1]
     * @throws InvalidParameterError if out of range
     */
    updateRecallRate(recallRate: number): void;
}
