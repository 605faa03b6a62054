/**
 * @fileoverview Bandit Router Engine
 *
 * Online selection between predictive classifiers with Thompson Sampling
 * and delayed feedback.
 *
 * The engine provides:
 * - Beta-prior Thompson Sampling with exponential forgetting
 * - A FIFO delayed-feedback queue
 * - Pure confusion-matrix metrics with a snapshot history
 * - A synchronous step/run orchestrator with an append-only prior log
 *
 * @module @bandit-router/engine
 * @example
 * ```typescript
 * import { SimulationEngine, calculateRecall } from "@bandit-router/engine";
 *
 * const engine = new SimulationEngine({ recallA: 0.8, recallB: 0.6, feedbackDelay: 10 });
 * engine.run(1000);
 * console.log(calculateRecall(engine.metrics));
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type { BinaryLabel, LabeledEvent } from "./contracts/index.js";
export { createLabeledEvent, isBinaryLabel } from "./contracts/index.js";

export type { EventSource, Classifier, RandomSource } from "./contracts/index.js";

export type { Logger, LogLevel } from "./contracts/index.js";
export { createConsoleLogger, isLogLevel, silentLogger } from "./contracts/index.js";

export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    StepEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// ============================================================================
// Error exports
// ============================================================================

export {
    InvalidParameterError,
    assertProbability,
    assertDecayRate,
    assertNonNegativeInteger,
} from "./errors/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryEventBus,
    FeedbackQueue,
    TransactionSource,
    SyntheticClassifier,
    createSeededRandom,
    type InMemoryEventBusOptions,
    type PendingFeedback,
} from "./impl/index.js";

// ============================================================================
// Bandit exports
// ============================================================================

export {
    ThompsonSampler,
    sampleBeta,
    sampleGamma,
    bayesianUpdate,
    decayPrior,
    summarizePrior,
    kMIN_PRIOR_SHAPE,
    kUNIFORM_PRIOR,
    type Prior,
    type PriorSummary,
    type ThompsonSamplerOptions,
} from "./bandit/index.js";

// ============================================================================
// Metrics exports
// ============================================================================

export {
    initializeMetrics,
    applyPrediction,
    calculateRecall,
    calculatePrecision,
    recallSeries,
    type ConfusionCounts,
} from "./metrics/index.js";

// ============================================================================
// Engine exports
// ============================================================================

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
} from "./engine/index.js";
