/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @bandit-router/engine/impl
 */

export { InMemoryEventBus, type InMemoryEventBusOptions } from "./InMemoryEventBus.js";
export { FeedbackQueue, type PendingFeedback } from "./FeedbackQueue.js";
export { TransactionSource } from "./TransactionSource.js";
export { SyntheticClassifier } from "./SyntheticClassifier.js";
export { createSeededRandom } from "./seededRandom.js";
