/**
 * @fileoverview Transaction Source
 *
 * Generates synthetic card transactions with a Bernoulli fraud label.
 * There are no features; the id exists only so hosts can display it.
 *
 * @module @bandit-router/engine/impl/TransactionSource
 */

import type { EventSource } from "../contracts/EventSource.js";
import type { LabeledEvent } from "../contracts/LabeledEvent.js";
import type { RandomSource } from "../contracts/RandomSource.js";
import { createLabeledEvent } from "../contracts/LabeledEvent.js";
import { assertProbability } from "../errors/InvalidParameterError.js";

/** Exclusive upper bound of generated transaction ids */
const kMAX_TRANSACTION_ID = 1_000_000;

/**
 * Synthetic transaction generator.
 *
 * @example
 * ```typescript
 * const source = new TransactionSource(0.05);
 * const tx = source.generate(); // { id: 482113, label: 0 }
 * source.setFraudRate(0.2);
 * ```
 */
export class TransactionSource implements EventSource {
    readonly id = "transaction-source";

    private rate: number;
    private readonly random: RandomSource;

    /**
     * @param fraudRate - Probability that a transaction is fraudulent, in [0, 1]
     * @param random - Uniform random source (default: Math.random)
     * @throws InvalidParameterError if fraudRate is out of range
     */
    constructor(fraudRate: number, random: RandomSource = Math.random) {
        assertProbability("fraudRate", fraudRate);
        this.rate   = fraudRate;
        this.random = random;
    }

    /**
     * Current fraud probability.
     */
    get fraudRate(): number {
        return this.rate;
    }

    /**
     * Generate one transaction.
     *
     * Draws the id first, then the label.
     */
    generate(): LabeledEvent {
        const id = 1 + Math.floor(this.random() * (kMAX_TRANSACTION_ID - 1));
        const label = this.random() < this.rate ? 1 : 0;
        return createLabeledEvent(id, label);
    }

    /**
     * Change the fraud probability for subsequent transactions.
     *
     * @throws InvalidParameterError if out of range
     */
    setFraudRate(fraudRate: number): void {
        assertProbability("fraudRate", fraudRate);
        this.rate = fraudRate;
    }
}
