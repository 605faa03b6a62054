/**
 * @fileoverview Bandit barrel exports
 *
 * @module @bandit-router/engine/bandit
 */

export { sampleGamma, sampleBeta } from "./betaSampler.js";
export {
    bayesianUpdate,
    decayPrior,
    summarizePrior,
    kMIN_PRIOR_SHAPE,
    kUNIFORM_PRIOR,
    type Prior,
    type PriorSummary,
} from "./Prior.js";
export { ThompsonSampler, type ThompsonSamplerOptions } from "./ThompsonSampler.js";
