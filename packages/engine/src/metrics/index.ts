/**
 * @fileoverview Metrics barrel exports
 *
 * @module @bandit-router/engine/metrics
 */

export {
    initializeMetrics,
    applyPrediction,
    calculateRecall,
    calculatePrecision,
    recallSeries,
    type ConfusionCounts,
} from "./ConfusionCounts.js";
