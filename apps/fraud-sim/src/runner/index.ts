/**
 * @fileoverview Runner barrel exports
 *
 * @module runner
 */

export {
    runSimulation,
    applyScheduledChange,
    type RunSimulationOptions,
    type RunSimulationResult,
} from "./runSimulation.js";
