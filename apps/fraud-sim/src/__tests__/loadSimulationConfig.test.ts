/**
 * @fileoverview Unit tests for the simulation profile loader
 *
 * Tests cover:
 * - loadSimulationConfig parsing, defaults and validation
 * - loadSimulationConfigWithFallback
 * - applyOverrides
 *
 * @module config/__tests__/loadSimulationConfig
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InvalidParameterError } from "@bandit-router/engine";
import {
    applyOverrides,
    getDefaultConfig,
    loadSimulationConfig,
    loadSimulationConfigWithFallback,
} from "../config/loadSimulationConfig.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    }
    catch (error) {
        return error;
    }
    throw new Error("Expected function to throw");
}

describe("loadSimulationConfig", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe("loadSimulationConfig", () => {
        // Scenario: Every section present
        it("should read every section of a full profile", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
models:
  recallA: 0.7
  recallB: 0.5
transactions:
  fraudRate: 0.1
feedback:
  delay: 3
  decayRate: 0.95
run:
  steps: 500
  seed: 7
schedule:
  - at: 300
    recallB: 0.9
  - at: 100
    recallA: 0.2
report:
  priorUpdates: 5
`);

            const config = loadSimulationConfig("/path/to/simulation.yml");

            expect(config).toEqual({
                recallA      : 0.7,
                recallB      : 0.5,
                feedbackDelay: 3,
                fraudRate    : 0.1,
                decayRate    : 0.95,
                steps        : 500,
                seed         : 7,
                schedule     : [
                    { at: 100, recallA: 0.2 },
                    { at: 300, recallB: 0.9 },
                ],
                reportUpdates: 5,
            });
            expect(mockReadFileSync).toHaveBeenCalledWith("/path/to/simulation.yml", "utf-8");
        });

        // Scenario: Partial profile
        it("should fill missing sections and fields with defaults", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
models:
  recallA: 0.9
`);

            const config = loadSimulationConfig("/path/to/simulation.yml");

            expect(config).toEqual({ ...getDefaultConfig(), recallA: 0.9 });
            expect(config.seed).toBeUndefined();
        });

        // Scenario: File missing
        it("should throw when the file does not exist", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => loadSimulationConfig("/missing.yml"))
                .toThrow("Simulation profile not found: /missing.yml");
            expect(mockReadFileSync).not.toHaveBeenCalled();
        });

        // Scenario: Wrong value type
        it("should reject non-numeric values with the field path", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
models:
  recallA: high
`);

            expect(() => loadSimulationConfig("/path/to/simulation.yml"))
                .toThrow("Invalid config: 'models.recallA' must be a number");
        });

        // Scenario: Section is not a mapping
        it("should reject a section that is not a mapping", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
feedback: 10
`);

            expect(() => loadSimulationConfig("/path/to/simulation.yml"))
                .toThrow("Invalid config: 'feedback' must be a mapping");
        });

        // Scenario: Top-level list
        it("should reject a profile that is not a mapping", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
- recallA: 0.8
`);

            expect(() => loadSimulationConfig("/path/to/simulation.yml"))
                .toThrow("Invalid config format: expected a mapping at the top level");
        });

        // Scenario: Out-of-range value
        it("should throw InvalidParameterError naming the out-of-range field", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
models:
  recallB: 1.5
`);

            const error = captureError(() => loadSimulationConfig("/path/to/simulation.yml"));

            expect(error).toBeInstanceOf(InvalidParameterError);
            expect(error).toMatchObject({ parameter: "recallB", value: 1.5 });
        });

        // Scenario: Fractional delay
        it("should reject a fractional feedback delay", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
feedback:
  delay: 2.5
`);

            expect(() => loadSimulationConfig("/path/to/simulation.yml"))
                .toThrow("feedbackDelay must be a non-negative integer.");
        });

        // Scenario: Schedule entry without iteration
        it("should reject a schedule entry without 'at'", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
schedule:
  - recallA: 0.3
`);

            expect(() => loadSimulationConfig("/path/to/simulation.yml"))
                .toThrow("Invalid schedule entry at index 0: missing 'at'");
        });

        // Scenario: Schedule entry out of range
        it("should validate schedule values with the engine's rules", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
schedule:
  - at: 10
    decayRate: 0
`);

            const error = captureError(() => loadSimulationConfig("/path/to/simulation.yml"));

            expect(error).toBeInstanceOf(InvalidParameterError);
            expect(error).toMatchObject({ parameter: "schedule.decayRate", value: 0 });
        });
    });

    describe("loadSimulationConfigWithFallback", () => {
        // Scenario: Missing file falls back
        it("should return defaults and warn when the file cannot be loaded", () => {
            mockExistsSync.mockReturnValue(false);
            const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

            const config = loadSimulationConfigWithFallback("/missing.yml", logger);

            expect(config).toEqual(getDefaultConfig());
            expect(logger.warn).toHaveBeenCalledWith(
                "Failed to load simulation profile, using defaults",
                { filePath: "/missing.yml", error: "Simulation profile not found: /missing.yml" }
            );
        });

        // Scenario: Valid file does not warn
        it("should return the loaded profile without warning", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("run:\n  steps: 42\n");
            const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

            const config = loadSimulationConfigWithFallback("/path/to/simulation.yml", logger);

            expect(config.steps).toBe(42);
            expect(logger.warn).not.toHaveBeenCalled();
        });
    });

    describe("getDefaultConfig", () => {
        it("should return the documented defaults", () => {
            expect(getDefaultConfig()).toEqual({
                recallA      : 0.8,
                recallB      : 0.6,
                feedbackDelay: 10,
                fraudRate    : 0.05,
                decayRate    : 1.0,
                steps        : 100,
                schedule     : [],
                reportUpdates: 10,
            });
        });

        it("should return a new object on each call", () => {
            expect(getDefaultConfig()).not.toBe(getDefaultConfig());
        });
    });

    describe("applyOverrides", () => {
        it("should replace only the defined fields", () => {
            const config = applyOverrides(getDefaultConfig(), {
                steps  : 250,
                seed   : 3,
                recallB: undefined,
            });

            expect(config).toEqual({ ...getDefaultConfig(), steps: 250, seed: 3 });
        });

        it("should keep the profile's schedule", () => {
            const base = { ...getDefaultConfig(), schedule: [{ at: 5, recallA: 0.1 }] };

            expect(applyOverrides(base, { steps: 10 }).schedule).toEqual([{ at: 5, recallA: 0.1 }]);
        });

        it("should re-validate overridden values", () => {
            const error = captureError(() => applyOverrides(getDefaultConfig(), { decayRate: 1.5 }));

            expect(error).toBeInstanceOf(InvalidParameterError);
            expect(error).toMatchObject({ parameter: "decayRate" });
        });
    });
});
