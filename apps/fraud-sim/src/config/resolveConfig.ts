/**
 * @fileoverview Profile resolution
 *
 * Combines the profile file, environment settings and CLI overrides.
 *
 * @module config/resolveConfig
 */

import { resolve } from "path";
import type { Logger } from "@bandit-router/engine";
import {
    applyOverrides,
    loadSimulationConfig,
    loadSimulationConfigWithFallback,
    type ConfigOverrides,
    type SimulationConfig,
} from "./loadSimulationConfig.js";
import type { EnvironmentSettings } from "./environment.js";

export interface ResolveConfigInput {
    /** Bundled profile, used when no path is given */
    readonly defaultPath: string;

    /** `--config` value */
    readonly cliConfigPath?: string;

    readonly cliOverrides: ConfigOverrides;
    readonly environment: EnvironmentSettings;
    readonly logger: Logger;
}

/**
 * Resolve the profile for a run.
 *
 * An explicitly named profile (CLI, then environment) must load. The
 * bundled profile falls back to defaults with a warning.
 *
 * @throws Error if an explicit profile is missing or malformed
 * @throws InvalidParameterError if any resolved value is out of range
 */
export function resolveConfig(input: ResolveConfigInput): SimulationConfig {
    const explicitPath = input.cliConfigPath ?? input.environment.configPath;

    const base = explicitPath !== undefined
        ? loadSimulationConfig(resolve(explicitPath))
        : loadSimulationConfigWithFallback(input.defaultPath, input.logger);

    return applyOverrides(base, {
        seed: input.environment.seed,
        ...input.cliOverrides,
    });
}
