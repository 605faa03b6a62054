/**
 * @fileoverview Synthetic Classifier
 *
 * A stand-in for a trained fraud model. It never produces a false
 * positive; on fraudulent events it flags with probability equal to its
 * recall rate.
 *
 * @module @bandit-router/engine/impl/SyntheticClassifier
 */

import type { Classifier } from "../contracts/Classifier.js";
import type { BinaryLabel, LabeledEvent } from "../contracts/LabeledEvent.js";
import type { RandomSource } from "../contracts/RandomSource.js";
import { assertProbability } from "../errors/InvalidParameterError.js";

/**
 * Classifier with a fixed recall and perfect precision.
 *
 * @example
 * ```typescript
 * const model = new SyntheticClassifier("Model A", 0.8);
 * model.predict({ id: 1, label: 0 }); // always 0
 * model.predict({ id: 2, label: 1 }); // 1 with probability 0.8
 * ```
 */
export class SyntheticClassifier implements Classifier {
    readonly name: string;

    private rate: number;
    private readonly random: RandomSource;

    /**
     * @param name - Unique classifier name
     * @param recallRate - Probability of flagging a fraudulent event, in [0, 1]
     * @param random - Uniform random source (default: Math.random)
     * @throws InvalidParameterError if recallRate is out of range
     */
    constructor(name: string, recallRate: number, random: RandomSource = Math.random) {
        assertProbability("recallRate", recallRate);
        this.name   = name;
        this.rate   = recallRate;
        this.random = random;
    }

    get recallRate(): number {
        return this.rate;
    }

    /**
     * Predict an event's label.
     *
     * Negative events short-circuit to 0 without consuming randomness.
     */
    predict(event: LabeledEvent): BinaryLabel {
        if (event.label !== 1) {
            return 0;
        }
        return this.random() < this.rate ? 1 : 0;
    }

    /**
     * Simulate drift by replacing the recall rate.
     *
     * @throws InvalidParameterError if out of range
     */
    updateRecallRate(recallRate: number): void {
        assertProbability("recallRate", recallRate);
        this.rate = recallRate;
    }
}
