/**
 * @fileoverview Unit tests for Gamma and Beta sampling
 *
 * Tests cover:
 * - Parameter validation
 * - Support of the Beta distribution
 * - Sample means at large N (seeded, so results are stable)
 *
 * @module @bandit-router/engine/__tests__/betaSampler
 */

import { describe, it, expect } from "vitest";
import { sampleBeta, sampleGamma } from "../bandit/betaSampler.js";
import { InvalidParameterError } from "../errors/InvalidParameterError.js";
import { createSeededRandom } from "../impl/seededRandom.js";

const kDRAWS = 20_000;

function meanOf(draw: () => number, n: number = kDRAWS): number {
    let total = 0;
    for (let i = 0; i < n; i++) {
        total += draw();
    }
    return total / n;
}

describe("sampleGamma", () => {
    // Scenario: Non-positive shape
    it("should reject a shape that is not positive", () => {
        expect(() => sampleGamma(0)).toThrow(InvalidParameterError);
        expect(() => sampleGamma(-1)).toThrow("Gamma shape must be > 0.");
        expect(() => sampleGamma(Number.NaN)).toThrow(InvalidParameterError);
    });

    // Scenario: Mean of Gamma(k, 1) is k
    it("should have mean close to the shape", () => {
        const random = createSeededRandom(101);

        expect(meanOf(() => sampleGamma(3, random))).toBeCloseTo(3, 1);
    });

    // Scenario: Shapes below 1 use the boost path
    it("should handle shapes below 1", () => {
        const random = createSeededRandom(202);

        const mean = meanOf(() => sampleGamma(0.5, random));

        expect(Math.abs(mean - 0.5)).toBeLessThan(0.03);
    });
});

describe("sampleBeta", () => {
    // Scenario: Invalid shape parameters are named
    it("should reject non-positive alpha or beta", () => {
        expect(() => sampleBeta(0, 1)).toThrow("Beta alpha must be > 0.");
        expect(() => sampleBeta(1, -2)).toThrow("Beta beta must be > 0.");
    });

    // Scenario: Draws stay in [0, 1]
    it("should return values in [0, 1]", () => {
        const random = createSeededRandom(5);
        const shapes: [number, number][] = [[1, 1], [0.2, 0.3], [50, 2], [2, 50], [0.01, 5]];

        for (const [alpha, beta] of shapes) {
            for (let i = 0; i < 500; i++) {
                const value = sampleBeta(alpha, beta, random);
                expect(value).toBeGreaterThanOrEqual(0);
                expect(value).toBeLessThanOrEqual(1);
            }
        }
    });

    // Scenario: Mean of Beta(a, b) is a / (a + b)
    it("should have mean close to alpha / (alpha + beta)", () => {
        const random = createSeededRandom(42);

        const mean = meanOf(() => sampleBeta(2, 5, random));

        expect(Math.abs(mean - 2 / 7)).toBeLessThan(0.01);
    });

    // Scenario: Symmetric U-shaped prior
    it("should center Beta(0.5, 0.5) on 0.5", () => {
        const random = createSeededRandom(9);

        const mean = meanOf(() => sampleBeta(0.5, 0.5, random));

        expect(Math.abs(mean - 0.5)).toBeLessThan(0.02);
    });

    // Scenario: Same seed, same draws
    it("should be reproducible for a given seed", () => {
        const first = createSeededRandom(1234);
        const second = createSeededRandom(1234);

        const a = Array.from({ length: 10 }, () => sampleBeta(3, 4, first));
        const b = Array.from({ length: 10 }, () => sampleBeta(3, 4, second));

        expect(a).toEqual(b);
    });
});
