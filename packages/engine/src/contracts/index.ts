/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and types that define the simulation engine contract.
 *
 * @module @bandit-router/engine/contracts
 */

// Events under evaluation
export type { BinaryLabel, LabeledEvent } from "./LabeledEvent.js";
export { createLabeledEvent, isBinaryLabel } from "./LabeledEvent.js";

// Event source contract
export type { EventSource } from "./EventSource.js";

// Classifier contract
export type { Classifier } from "./Classifier.js";

// Randomness
export type { RandomSource } from "./RandomSource.js";

// Logging
export type { Logger, LogLevel } from "./Logger.js";
export { createConsoleLogger, isLogLevel, silentLogger } from "./Logger.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    StepEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
