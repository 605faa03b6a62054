/**
 * @fileoverview Confusion matrix counts
 *
 * Pure functions over immutable count snapshots. Nothing here mutates its
 * input, so the engine can append each result to its history as-is.
 *
 * @module @bandit-router/engine/metrics/ConfusionCounts
 */

import type { BinaryLabel, LabeledEvent } from "../contracts/LabeledEvent.js";
import { isBinaryLabel } from "../contracts/LabeledEvent.js";
import { InvalidParameterError } from "../errors/InvalidParameterError.js";

/**
 * Confusion matrix counts.
 */
export interface ConfusionCounts {
    readonly truePositives: number;
    readonly falseNegatives: number;
    readonly falsePositives: number;
    readonly trueNegatives: number;
}

/**
 * Zeroed counts.
 */
export function initializeMetrics(): ConfusionCounts {
    return Object.freeze({
        truePositives : 0,
        falseNegatives: 0,
        falsePositives: 0,
        trueNegatives : 0,
    });
}

/**
 * Score one prediction against its event's label.
 *
 * | label | prediction | category       |
 * |-------|------------|----------------|
 * | 1     | 1          | truePositives  |
 * | 1     | 0          | falseNegatives |
 * | 0     | 1          | falsePositives |
 * | 0     | 0          | trueNegatives  |
 *
 * @param counts - Current counts (not mutated)
 * @param event - Event carrying the ground truth
 * @param prediction - Classifier output
 * @returns New frozen counts with exactly one category incremented
 * @throws InvalidParameterError if label or prediction is not 0 or 1
 */
export function applyPrediction(
    counts: ConfusionCounts,
    event: LabeledEvent,
    prediction: BinaryLabel
): ConfusionCounts {
    if (!isBinaryLabel(event.label)) {
        throw new InvalidParameterError("label", event.label, "Event label must be 0 or 1.");
    }
    if (!isBinaryLabel(prediction)) {
        throw new InvalidParameterError("prediction", prediction, "Prediction must be 0 or 1.");
    }

    const positive = event.label === 1;
    const flagged = prediction === 1;

    return Object.freeze({
        truePositives : counts.truePositives + (positive && flagged ? 1 : 0),
        falseNegatives: counts.falseNegatives + (positive && !flagged ? 1 : 0),
        falsePositives: counts.falsePositives + (!positive && flagged ? 1 : 0),
        trueNegatives : counts.trueNegatives + (!positive && !flagged ? 1 : 0),
    });
}

/**
 * tp / (tp + fn), or 0 when there are no positives yet.
 */
export function calculateRecall(counts: ConfusionCounts): number {
    const denominator = counts.truePositives + counts.falseNegatives;
    return denominator > 0 ? counts.truePositives / denominator : 0.0;
}

/**
 * tp / (tp + fp), or 0 when nothing was flagged yet.
 */
export function calculatePrecision(counts: ConfusionCounts): number {
    const denominator = counts.truePositives + counts.falsePositives;
    return denominator > 0 ? counts.truePositives / denominator : 0.0;
}

/**
 * Recall after each snapshot of a metrics history.
 */
export function recallSeries(history: readonly ConfusionCounts[]): number[] {
    return history.map(calculateRecall);
}
