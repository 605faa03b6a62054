/**
 * @fileoverview Unit tests for environment settings
 *
 * @module config/__tests__/environment
 */

import { describe, it, expect } from "vitest";
import { readEnvironment, resolveLogLevel } from "../config/environment.js";

describe("readEnvironment", () => {
    it("should return no settings for an empty environment", () => {
        expect(readEnvironment({})).toEqual({});
    });

    it("should read and normalize every variable", () => {
        const settings = readEnvironment({
            FRAUD_SIM_CONFIG   : " ./profiles/drift.yml ",
            FRAUD_SIM_SEED     : "42",
            FRAUD_SIM_LOG_LEVEL: "DEBUG",
        });

        expect(settings).toEqual({
            configPath: "./profiles/drift.yml",
            seed      : 42,
            logLevel  : "debug",
        });
    });

    // Scenario: .env lines left blank
    it("should treat empty values as unset", () => {
        expect(readEnvironment({ FRAUD_SIM_SEED: "", FRAUD_SIM_LOG_LEVEL: "  " })).toEqual({});
    });

    it("should reject a seed that is not a non-negative integer", () => {
        expect(() => readEnvironment({ FRAUD_SIM_SEED: "abc" }))
            .toThrow('FRAUD_SIM_SEED must be a non-negative integer, got "abc"');
        expect(() => readEnvironment({ FRAUD_SIM_SEED: "-3" }))
            .toThrow('FRAUD_SIM_SEED must be a non-negative integer, got "-3"');
    });

    it("should reject an unknown log level", () => {
        expect(() => readEnvironment({ FRAUD_SIM_LOG_LEVEL: "loud" }))
            .toThrow('FRAUD_SIM_LOG_LEVEL must be one of debug, info, warn, error; got "loud"');
    });
});

describe("resolveLogLevel", () => {
    it("should default to info", () => {
        expect(resolveLogLevel({}, false)).toBe("info");
    });

    it("should use FRAUD_SIM_LOG_LEVEL without --verbose", () => {
        expect(resolveLogLevel({ logLevel: "warn" }, false)).toBe("warn");
    });

    // Scenario: .env sets info, the command line asks for verbose output
    it("should let --verbose override FRAUD_SIM_LOG_LEVEL", () => {
        expect(resolveLogLevel({ logLevel: "info" }, true)).toBe("debug");
        expect(resolveLogLevel({ logLevel: "error" }, true)).toBe("debug");
    });
});
