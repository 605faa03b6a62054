/**
 * @fileoverview Simulation Profile Loader
 *
 * Loads a simulation profile from YAML and layers environment and
 * command-line overrides on top of it.
 *
 * Precedence, lowest first: defaults, YAML file, environment, CLI flags.
 *
 * @module config/loadSimulationConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    assertDecayRate,
    assertNonNegativeInteger,
    assertProbability,
    type Logger,
} from "@bandit-router/engine";

/**
 * Parameter change applied before a given iteration.
 */
export interface ScheduledChange {
    /** Iteration (1-based) before which the change is applied */
    readonly at: number;
    readonly recallA?: number;
    readonly recallB?: number;
    readonly feedbackDelay?: number;
    readonly fraudRate?: number;
    readonly decayRate?: number;
}

/**
 * Fully resolved simulation profile.
 */
export interface SimulationConfig {
    readonly recallA: number;
    readonly recallB: number;
    readonly feedbackDelay: number;
    readonly fraudRate: number;
    readonly decayRate: number;

    /** Number of iterations to run */
    readonly steps: number;

    /** Seed for reproducible runs; Math.random when absent */
    readonly seed?: number;

    /** Parameter changes, sorted by iteration */
    readonly schedule: readonly ScheduledChange[];

    /** Number of recent prior updates shown in the report */
    readonly reportUpdates: number;
}

/**
 * Fields that may be overridden from the environment or CLI.
 */
export type ConfigOverrides = Partial<Omit<SimulationConfig, "schedule">>;

/**
 * Get the default profile.
 */
export function getDefaultConfig(): SimulationConfig {
    return {
        recallA      : 0.8,
        recallB      : 0.6,
        feedbackDelay: 10,
        fraudRate    : 0.05,
        decayRate    : 1.0,
        steps        : 100,
        schedule     : [],
        reportUpdates: 10,
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read an optional numeric field from a YAML section.
 */
function readNumber(section: Record<string, unknown>, key: string, path: string): number | undefined {
    const value = section[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new Error(`Invalid config: '${path}.${key}' must be a number`);
    }
    return value;
}

/**
 * Read an optional mapping section; absent sections are empty.
 */
function readSection(root: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = root[key];
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRecord(value)) {
        throw new Error(`Invalid config: '${key}' must be a mapping`);
    }
    return value;
}

/**
 * Range-check a profile with the same rules the engine applies.
 *
 * @throws InvalidParameterError naming the first bad field
 */
export function validateConfig(config: SimulationConfig): SimulationConfig {
    assertProbability("recallA", config.recallA);
    assertProbability("recallB", config.recallB);
    assertNonNegativeInteger("feedbackDelay", config.feedbackDelay);
    assertProbability("fraudRate", config.fraudRate);
    assertDecayRate("decayRate", config.decayRate);
    assertNonNegativeInteger("steps", config.steps);
    assertNonNegativeInteger("reportUpdates", config.reportUpdates);
    if (config.seed !== undefined) {
        assertNonNegativeInteger("seed", config.seed);
    }

    for (const change of config.schedule) {
        assertNonNegativeInteger("schedule.at", change.at);
        if (change.recallA !== undefined) assertProbability("schedule.recallA", change.recallA);
        if (change.recallB !== undefined) assertProbability("schedule.recallB", change.recallB);
        if (change.feedbackDelay !== undefined) assertNonNegativeInteger("schedule.feedbackDelay", change.feedbackDelay);
        if (change.fraudRate !== undefined) assertProbability("schedule.fraudRate", change.fraudRate);
        if (change.decayRate !== undefined) assertDecayRate("schedule.decayRate", change.decayRate);
    }

    return config;
}

/**
 * Parse the `schedule` list.
 */
function readSchedule(root: Record<string, unknown>): ScheduledChange[] {
    const raw = root.schedule;
    if (raw === undefined || raw === null) {
        return [];
    }
    if (!Array.isArray(raw)) {
        throw new Error("Invalid config: 'schedule' must be a list");
    }

    const schedule = raw.map((entry: unknown, index): ScheduledChange => {
        if (!isRecord(entry)) {
            throw new Error(`Invalid schedule entry at index ${index}: expected a mapping`);
        }

        const path = `schedule[${index}]`;
        const at = readNumber(entry, "at", path);
        if (at === undefined) {
            throw new Error(`Invalid schedule entry at index ${index}: missing 'at'`);
        }

        return {
            at,
            recallA      : readNumber(entry, "recallA", path),
            recallB      : readNumber(entry, "recallB", path),
            feedbackDelay: readNumber(entry, "feedbackDelay", path),
            fraudRate    : readNumber(entry, "fraudRate", path),
            decayRate    : readNumber(entry, "decayRate", path),
        };
    });

    return schedule.sort((a, b) => a.at - b.at);
}

/**
 * Load a simulation profile from a YAML file.
 *
 * Missing sections and fields take their defaults.
 *
 * @param filePath - Path to the profile
 * @returns Validated profile
 * @throws Error if the file doesn't exist or is malformed
 * @throws InvalidParameterError if a value is out of range
 *
 * @example
 * ```typescript
 * const config = loadSimulationConfig("./config/simulation.yml");
 * // { recallA: 0.8, recallB: 0.6, feedbackDelay: 10, ... }
 * ```
 */
export function loadSimulationConfig(filePath: string): SimulationConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Simulation profile not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (parsed === null || parsed === undefined) {
        return getDefaultConfig();
    }
    if (!isRecord(parsed)) {
        throw new Error("Invalid config format: expected a mapping at the top level");
    }

    const defaults = getDefaultConfig();
    const models = readSection(parsed, "models");
    const transactions = readSection(parsed, "transactions");
    const feedback = readSection(parsed, "feedback");
    const run = readSection(parsed, "run");
    const report = readSection(parsed, "report");

    return validateConfig({
        recallA      : readNumber(models, "recallA", "models") ?? defaults.recallA,
        recallB      : readNumber(models, "recallB", "models") ?? defaults.recallB,
        fraudRate    : readNumber(transactions, "fraudRate", "transactions") ?? defaults.fraudRate,
        feedbackDelay: readNumber(feedback, "delay", "feedback") ?? defaults.feedbackDelay,
        decayRate    : readNumber(feedback, "decayRate", "feedback") ?? defaults.decayRate,
        steps        : readNumber(run, "steps", "run") ?? defaults.steps,
        seed         : readNumber(run, "seed", "run"),
        schedule     : readSchedule(parsed),
        reportUpdates: readNumber(report, "priorUpdates", "report") ?? defaults.reportUpdates,
    });
}

/**
 * Load a profile, falling back to defaults when it cannot be read.
 *
 * @param filePath - Path to the profile
 * @param logger - Receives the fallback warning
 */
export function loadSimulationConfigWithFallback(filePath: string, logger: Logger): SimulationConfig {
    try {
        return loadSimulationConfig(filePath);
    }
    catch (error) {
        logger.warn("Failed to load simulation profile, using defaults", {
            filePath,
            error: error instanceof Error ? error.message : String(error),
        });
        return getDefaultConfig();
    }
}

/**
 * Apply overrides on top of a profile and re-validate.
 *
 * Undefined override fields are ignored.
 *
 * @throws InvalidParameterError if an override is out of range
 */
export function applyOverrides(config: SimulationConfig, overrides: ConfigOverrides): SimulationConfig {
    return validateConfig({
        recallA      : overrides.recallA ?? config.recallA,
        recallB      : overrides.recallB ?? config.recallB,
        feedbackDelay: overrides.feedbackDelay ?? config.feedbackDelay,
        fraudRate    : overrides.fraudRate ?? config.fraudRate,
        decayRate    : overrides.decayRate ?? config.decayRate,
        steps        : overrides.steps ?? config.steps,
        seed         : overrides.seed ?? config.seed,
        schedule     : config.schedule,
        reportUpdates: overrides.reportUpdates ?? config.reportUpdates,
    });
}
