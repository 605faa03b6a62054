/**
 * @fileoverview Gamma and Beta sampling
 *
 * Marsaglia & Tsang gamma sampler with the usual boost for shapes below 1.
 * A Beta(a, b) draw is X / (X + Y) with X ~ Gamma(a), Y ~ Gamma(b).
 *
 * Every draw takes its uniform source explicitly so runs can be seeded.
 *
 * @module @bandit-router/engine/bandit/betaSampler
 */

import type { RandomSource } from "../contracts/RandomSource.js";
import { InvalidParameterError } from "../errors/InvalidParameterError.js";

/**
 * Standard normal draw via Box-Muller.
 */
function sampleStandardNormal(random: RandomSource): number {
    // 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - random();
    const u2 = random();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Draw from Gamma(shape, 1).
 *
 * @param shape - Must be > 0
 * @param random - Uniform source
 * @throws InvalidParameterError if shape is not positive
 */
export function sampleGamma(shape: number, random: RandomSource = Math.random): number {
    if (!(shape > 0) || !Number.isFinite(shape)) {
        throw new InvalidParameterError("shape", shape, "Gamma shape must be > 0.");
    }

    if (shape < 1) {
        const u = 1 - random();
        return sampleGamma(shape + 1, random) * Math.pow(u, 1 / shape);
    }

    const d = shape - 1 / 3;
    const c = 1 / Math.sqrt(9 * d);

    for (;;) {
        const x = sampleStandardNormal(random);
        let v = 1 + c * x;
        if (v <= 0) {
            continue;
        }

        v = v * v * v;
        const u = random();

        if (u < 1 - 0.0331 * (x * x) * (x * x)) {
            return d * v;
        }
        if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) {
            return d * v;
        }
    }
}

/**
 * Draw from Beta(alpha, beta).
 *
 * @returns A value in [0, 1]
 * @throws InvalidParameterError if either shape is not positive
 */
export function sampleBeta(alpha: number, beta: number, random: RandomSource = Math.random): number {
    if (!(alpha > 0) || !Number.isFinite(alpha)) {
        throw new InvalidParameterError("alpha", alpha, "Beta alpha must be > 0.");
    }
    if (!(beta > 0) || !Number.isFinite(beta)) {
        throw new InvalidParameterError("beta", beta, "Beta beta must be > 0.");
    }

    const x = sampleGamma(alpha, random);
    const y = sampleGamma(beta, random);
    const total = x + y;

    // Both draws can underflow to 0 for tiny shapes
    if (total === 0) {
        return alpha / (alpha + beta);
    }
    return x / total;
}
