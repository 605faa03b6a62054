/**
 * @fileoverview Seeded random source
 *
 * Mulberry32: a small deterministic PRNG. Used when a run must be
 * reproducible from a seed; otherwise the engine uses Math.random.
 *
 * @module @bandit-router/engine/impl/seededRandom
 */

import type { RandomSource } from "../contracts/RandomSource.js";

/**
 * Create a deterministic random source from a 32-bit seed.
 *
 * @param seed - Any integer; only the low 32 bits are used
 * @returns RandomSource yielding floats in [0, 1)
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;

    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}
