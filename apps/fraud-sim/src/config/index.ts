/**
 * @fileoverview Config barrel exports
 *
 * @module config
 */

export {
    applyOverrides,
    getDefaultConfig,
    loadSimulationConfig,
    loadSimulationConfigWithFallback,
    validateConfig,
    type ConfigOverrides,
    type ScheduledChange,
    type SimulationConfig,
} from "./loadSimulationConfig.js";
export { readEnvironment, resolveLogLevel, type EnvironmentSettings } from "./environment.js";
export { resolveConfig, type ResolveConfigInput } from "./resolveConfig.js";
