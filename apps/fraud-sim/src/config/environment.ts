/**
 * @fileoverview Environment settings
 *
 * Variables (loaded from `.env` by dotenv at startup):
 * - FRAUD_SIM_CONFIG: path to the simulation profile
 * - FRAUD_SIM_SEED: seed for reproducible runs
 * - FRAUD_SIM_LOG_LEVEL: debug | info | warn | error
 *
 * @module config/environment
 */

import { isLogLevel, type LogLevel } from "@bandit-router/engine";

export interface EnvironmentSettings {
    readonly configPath?: string;
    readonly seed?: number;
    readonly logLevel?: LogLevel;
}

/**
 * Read simulation settings from an environment map.
 *
 * Empty values count as unset.
 *
 * @throws Error if a set value cannot be parsed
 */
export function readEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentSettings {
    const configPath = env.FRAUD_SIM_CONFIG?.trim() || undefined;
    const rawSeed = env.FRAUD_SIM_SEED?.trim() || undefined;
    const rawLevel = env.FRAUD_SIM_LOG_LEVEL?.trim().toLowerCase() || undefined;

    let seed: number | undefined;
    if (rawSeed !== undefined) {
        seed = Number(rawSeed);
        if (!Number.isInteger(seed) || seed < 0) {
            throw new Error(`FRAUD_SIM_SEED must be a non-negative integer, got "${rawSeed}"`);
        }
    }

    let logLevel: LogLevel | undefined;
    if (rawLevel !== undefined) {
        if (!isLogLevel(rawLevel)) {
            throw new Error(`FRAUD_SIM_LOG_LEVEL must be one of debug, info, warn, error; got "${rawLevel}"`);
        }
        logLevel = rawLevel;
    }

    return { configPath, seed, logLevel };
}

/**
 * Log level for a run. `--verbose` outranks FRAUD_SIM_LOG_LEVEL.
 */
export function resolveLogLevel(environment: EnvironmentSettings, verbose: boolean): LogLevel {
    if (verbose) {
        return "debug";
    }
    return environment.logLevel ?? "info";
}
