/**
 * @fileoverview ThompsonSampler
 *
 * Bandit selector over Beta priors with exponential forgetting.
 *
 * Selection: draw once from each arm's Beta(alpha, beta) and pick the
 * largest draw. Update: scale alpha and beta by the decay rate (floored at
 * kMIN_PRIOR_SHAPE), then add the new observation at full weight.
 *
 * @module @bandit-router/engine/bandit/ThompsonSampler
 */

import type { RandomSource } from "../contracts/RandomSource.js";
import { isBinaryLabel } from "../contracts/LabeledEvent.js";
import { InvalidParameterError, assertDecayRate } from "../errors/InvalidParameterError.js";
import { sampleBeta } from "./betaSampler.js";
import {
    bayesianUpdate,
    decayPrior,
    kMIN_PRIOR_SHAPE,
    kUNIFORM_PRIOR,
    type Prior,
} from "./Prior.js";

/**
 * ThompsonSampler options.
 */
export interface ThompsonSamplerOptions {
    /** Multiplier applied to alpha and beta before each update, in (0, 1] (default: 1.0) */
    readonly decayRate?: number;

    /** Uniform source for Beta draws (default: Math.random) */
    readonly random?: RandomSource;

    /** Starting prior for every arm (default: Beta(1, 1)) */
    readonly initialPrior?: Prior;
}

/**
 * Thompson Sampling over named arms.
 *
 * @example
 * ```typescript
 * const sampler = new ThompsonSampler(["Model A", "Model B"], { decayRate: 0.95 });
 *
 * const arm = sampler.select();
 * sampler.updatePrior(arm, 1); // true positive
 * sampler.getPrior(arm);       // { alpha: 1.95, beta: 0.95 }
 * ```
 */
export class ThompsonSampler {
    private readonly state: Map<string, Prior> = new Map();
    private readonly random: RandomSource;
    private decay: number;

    /**
     * @param arms - Arm names in tie-break order; must be non-empty and unique
     * @throws InvalidParameterError on bad arms, decay rate or initial prior
     */
    constructor(arms: readonly string[], options: ThompsonSamplerOptions = {}) {
        const decayRate = options.decayRate ?? 1.0;
        const initial = options.initialPrior ?? kUNIFORM_PRIOR;

        if (arms.length === 0) {
            throw new InvalidParameterError("arms", arms, "At least one arm is required.");
        }
        if (new Set(arms).size !== arms.length) {
            throw new InvalidParameterError("arms", arms, "Arm names must be unique.");
        }
        if (!(initial.alpha >= kMIN_PRIOR_SHAPE) || !(initial.beta >= kMIN_PRIOR_SHAPE)) {
            throw new InvalidParameterError(
                "initialPrior",
                initial,
                `Prior alpha and beta must be >= ${kMIN_PRIOR_SHAPE}.`
            );
        }
        assertDecayRate("decayRate", decayRate);

        for (const arm of arms) {
            this.state.set(arm, Object.freeze({ alpha: initial.alpha, beta: initial.beta }));
        }
        this.decay  = decayRate;
        this.random = options.random ?? Math.random;
    }

    get decayRate(): number {
        return this.decay;
    }

    /**
     * Arm names in registration order.
     */
    get arms(): string[] {
        return Array.from(this.state.keys());
    }

    /**
     * Change the decay rate for subsequent updates.
     *
     * @throws InvalidParameterError unless 0 < decayRate <= 1
     */
    setDecayRate(decayRate: number): void {
        assertDecayRate("decayRate", decayRate);
        this.decay = decayRate;
    }

    /**
     * Pick an arm by sampling every prior once.
     *
     * Arms are sampled in registration order; on an exact tie the
     * earlier arm wins.
     */
    select(): string {
        let winner = "";
        let best = Number.NEGATIVE_INFINITY;

        for (const [arm, prior] of this.state) {
            const sample = sampleBeta(prior.alpha, prior.beta, this.random);
            if (sample > best) {
                best = sample;
                winner = arm;
            }
        }

        return winner;
    }

    /**
     * Apply one observation to an arm's prior.
     *
     * alpha and beta are multiplied by the decay rate first, but never
     * drop below kMIN_PRIOR_SHAPE; then alpha (outcome 1) or beta
     * (outcome 0) is incremented by 1.
     *
     * @param arm - Arm name
     * @param outcome - 1 for a true positive, 0 for a false negative
     * @returns The updated prior
     * @throws InvalidParameterError for an unknown arm or an outcome outside {0, 1}
     */
    updatePrior(arm: string, outcome: number): Prior {
        if (!isBinaryLabel(outcome)) {
            throw new InvalidParameterError(
                "outcome",
                outcome,
                "Outcome must be 1 (true positive) or 0 (false negative)."
            );
        }

        const prior = this.state.get(arm);
        if (!prior) {
            throw new InvalidParameterError("classifierName", arm, `Unknown classifier: ${arm}`);
        }

        const next = bayesianUpdate(decayPrior(prior, this.decay), outcome);
        this.state.set(arm, next);

        return { alpha: next.alpha, beta: next.beta };
    }

    /**
     * Copy of one arm's prior.
     *
     * @throws InvalidParameterError for an unknown arm
     */
    getPrior(arm: string): Prior {
        const prior = this.state.get(arm);
        if (!prior) {
            throw new InvalidParameterError("classifierName", arm, `Unknown classifier: ${arm}`);
        }
        return { alpha: prior.alpha, beta: prior.beta };
    }

    /**
     * Copies of all priors keyed by arm name.
     */
    get priors(): Record<string, Prior> {
        const result: Record<string, Prior> = {};
        for (const [arm, prior] of this.state) {
            result[arm] = { alpha: prior.alpha, beta: prior.beta };
        }
        return result;
    }
}
