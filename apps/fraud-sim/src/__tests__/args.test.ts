/**
 * @fileoverview Unit tests for command-line parsing
 *
 * @module cli/__tests__/args
 */

import { describe, it, expect } from "vitest";
import { getOption, hasFlag, parseArgs, readCliOptions } from "../cli/args.js";

describe("parseArgs", () => {
    it("should split options, flags and positional arguments", () => {
        const parsed = parseArgs(["--steps", "10", "--verbose", "-h", "extra"]);

        expect(parsed).toEqual({
            positional: ["extra"],
            flags     : { verbose: true, h: true },
            options   : { steps: "10" },
        });
    });

    it("should treat a single-dash token after an option as its value", () => {
        expect(parseArgs(["--seed", "-1"]).options).toEqual({ seed: "-1" });
    });

    it("should look up aliases in order", () => {
        const parsed = parseArgs(["-v", "--config", "a.yml"]);

        expect(hasFlag(parsed, "verbose", "v")).toBe(true);
        expect(hasFlag(parsed, "help", "h")).toBe(false);
        expect(getOption(parsed, "profile", "config")).toBe("a.yml");
        expect(getOption(parsed, "steps")).toBeUndefined();
    });
});

describe("readCliOptions", () => {
    it("should map options to profile overrides", () => {
        const options = readCliOptions([
            "--steps", "500",
            "--seed", "42",
            "--recall-a", "0.9",
            "--delay", "4",
            "--config", "profiles/drift.yml",
            "-v",
        ]);

        expect(options).toEqual({
            configPath: "profiles/drift.yml",
            verbose   : true,
            help      : false,
            overrides : { steps: 500, seed: 42, recallA: 0.9, feedbackDelay: 4 },
        });
    });

    it("should return empty overrides without arguments", () => {
        expect(readCliOptions([])).toEqual({
            configPath: undefined,
            verbose   : false,
            help      : false,
            overrides : {},
        });
    });

    it("should recognize --help", () => {
        expect(readCliOptions(["--help"]).help).toBe(true);
    });

    // Scenario: Range checks happen later, against the whole profile
    it("should accept syntactically valid numbers outside their range", () => {
        expect(readCliOptions(["--fraud-rate", "2"]).overrides).toEqual({ fraudRate: 2 });
    });

    it("should reject an option missing its value", () => {
        expect(() => readCliOptions(["--steps"])).toThrow("Missing value for --steps");
        expect(() => readCliOptions(["--config", "--verbose"])).toThrow("Missing value for --config");
    });

    it("should reject unknown options and flags", () => {
        expect(() => readCliOptions(["--bogus", "1"])).toThrow("Unknown option: --bogus");
        expect(() => readCliOptions(["--dry-run"])).toThrow("Unknown option: --dry-run");
        expect(() => readCliOptions(["-x"])).toThrow("Unknown option: -x");
    });

    it("should reject non-numeric values", () => {
        expect(() => readCliOptions(["--steps", "ten"])).toThrow('--steps expects a number, got "ten"');
    });

    it("should reject positional arguments", () => {
        expect(() => readCliOptions(["run"])).toThrow("Unexpected argument: run");
    });
});
