/**
 * @fileoverview Engine barrel exports
 *
 * @module @bandit-router/engine/engine
 */

export {
    SimulationEngine,
    kMODEL_A,
    kMODEL_B,
    type EngineConfig,
    type PriorUpdateLogEntry,
    type ResolvedParameters,
    type RunOptions,
    type SimulationParameters,
    type SimulationSnapshot,
} from "./SimulationEngine.js";
