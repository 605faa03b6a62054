/**
 * @fileoverview Beta prior helpers
 *
 * @module @bandit-router/engine/bandit/Prior
 */

import { isBinaryLabel } from "../contracts/LabeledEvent.js";
import { InvalidParameterError } from "../errors/InvalidParameterError.js";

/**
 * Beta distribution shape parameters for one classifier's recall.
 */
export interface Prior {
    readonly alpha: number;
    readonly beta: number;
}

/**
 * Uniform Beta(1, 1).
 */
export const kUNIFORM_PRIOR: Prior = Object.freeze({ alpha: 1, beta: 1 });

/**
 * Floor for alpha and beta. Keeps repeated decay from reaching 0, which
 * the Beta sampler rejects.
 */
export const kMIN_PRIOR_SHAPE = 1e-6;

/**
 * Scale both shape parameters by `decayRate`, never below kMIN_PRIOR_SHAPE.
 * Returns a new prior.
 */
export function decayPrior(prior: Prior, decayRate: number): Prior {
    return Object.freeze({
        alpha: Math.max(kMIN_PRIOR_SHAPE, prior.alpha * decayRate),
        beta : Math.max(kMIN_PRIOR_SHAPE, prior.beta * decayRate),
    });
}

/**
 * Conjugate update without decay. Returns a new prior.
 *
 * @param prior - Current prior (not mutated)
 * @param outcome - 1 for a true positive, 0 for a false negative
 * @throws InvalidParameterError if outcome is not 0 or 1
 */
export function bayesianUpdate(prior: Prior, outcome: number): Prior {
    if (!isBinaryLabel(outcome)) {
        throw new InvalidParameterError(
            "outcome",
            outcome,
            "Outcome must be 1 (true positive) or 0 (false negative)."
        );
    }

    return Object.freeze({
        alpha: prior.alpha + (outcome === 1 ? 1 : 0),
        beta : prior.beta + (outcome === 1 ? 0 : 1),
    });
}

/**
 * Summary statistics of a Beta prior, for display.
 */
export interface PriorSummary {
    readonly alpha: number;
    readonly beta: number;
    /** alpha / (alpha + beta) */
    readonly mean: number;
    readonly variance: number;
    /** alpha + beta; how much evidence the prior holds */
    readonly strength: number;
}

export function summarizePrior(prior: Prior): PriorSummary {
    const strength = prior.alpha + prior.beta;
    return {
        alpha   : prior.alpha,
        beta    : prior.beta,
        mean    : prior.alpha / strength,
        variance: (prior.alpha * prior.beta) / (strength * strength * (strength + 1)),
        strength,
    };
}
