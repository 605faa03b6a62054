/**
 * @fileoverview SimulationEngine
 *
 * The orchestrator of the model routing simulation.
 *
 * Step flow:
 * 1. Advance the iteration counter
 * 2. Generate one labeled transaction
 * 3. Thompson-sample a classifier and count the selection
 * 4. Predict and enqueue the prediction with its due iteration
 * 5. Resolve all feedback that is now due
 *
 * Only fraudulent transactions are scored on resolution: they update the
 * selected classifier's prior, the confusion counts and the logs.
 * Legitimate ones leave the queue without touching any state.
 *
 * The engine is synchronous. A step runs to completion before it returns,
 * and every event it emits has been dispatched by then.
 *
 * @module @bandit-router/engine/engine/SimulationEngine
 */

import type { BinaryLabel } from "../contracts/LabeledEvent.js";
import type { Classifier } from "../contracts/Classifier.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import type { Logger } from "../contracts/Logger.js";
import type { RandomSource } from "../contracts/RandomSource.js";
import { createEvent } from "../contracts/EventBus.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import {
    InvalidParameterError,
    assertDecayRate,
    assertNonNegativeInteger,
    assertProbability,
} from "../errors/InvalidParameterError.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { FeedbackQueue, type PendingFeedback } from "../impl/FeedbackQueue.js";
import { TransactionSource } from "../impl/TransactionSource.js";
import { SyntheticClassifier } from "../impl/SyntheticClassifier.js";
import { ThompsonSampler } from "../bandit/ThompsonSampler.js";
import type { Prior } from "../bandit/Prior.js";
import {
    applyPrediction,
    initializeMetrics,
    type ConfusionCounts,
} from "../metrics/ConfusionCounts.js";

/** Name of the classifier driven by `recallA` */
export const kMODEL_A = "Model A";

/** Name of the classifier driven by `recallB` */
export const kMODEL_B = "Model B";

const kDEFAULT_FRAUD_RATE = 0.05;
const kDEFAULT_DECAY_RATE = 1.0;

/**
 * Parameters accepted at construction and on update.
 */
export interface SimulationParameters {
    /** Recall of Model A, in [0, 1] */
    readonly recallA: number;

    /** Recall of Model B, in [0, 1] */
    readonly recallB: number;

    /** Iterations between a prediction and its feedback; integer >= 0 */
    readonly feedbackDelay: number;

    /** Probability a transaction is fraudulent, in [0, 1] (default: 0.05; kept when omitted on update) */
    readonly fraudRate?: number;

    /** Prior decay per update, in (0, 1] (default: 1.0, also when omitted on update) */
    readonly decayRate?: number;
}

/**
 * Parameters currently in effect, with defaults filled in.
 */
export type ResolvedParameters = Required<SimulationParameters>;

/**
 * Engine configuration options.
 */
export interface EngineConfig {
    /** Custom EventBus (default: InMemoryEventBus sharing the engine logger) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: Logger;

    /** Uniform source for every random draw (default: Math.random) */
    readonly random?: RandomSource;
}

/**
 * One prior update, recorded when feedback for a fraudulent transaction
 * is resolved.
 */
export interface PriorUpdateLogEntry {
    readonly iteration: number;
    readonly classifierName: string;
    readonly outcome: "TP" | "FN";
    readonly oldAlpha: number;
    readonly oldBeta: number;
    readonly newAlpha: number;
    readonly newBeta: number;
}

/**
 * Options for run().
 */
export interface RunOptions {
    /** Checked between steps; an aborted signal stops the run early */
    readonly signal?: AbortSignal;
}

/**
 * Everything a presentation layer reads after a command.
 */
export interface SimulationSnapshot {
    readonly currentIteration: number;
    readonly parameters: ResolvedParameters;
    readonly priors: Record<string, Prior>;
    readonly metrics: ConfusionCounts;
    readonly metricsHistory: readonly ConfusionCounts[];
    readonly selectionCounts: Record<string, number>;
    readonly priorUpdateLog: readonly PriorUpdateLogEntry[];
    readonly lastSelectedClassifier: string | null;
    readonly pendingFeedbackCount: number;
}

/**
 * Generate a unique trace ID for one step.
 */
function generateTraceId(iteration: number): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `st_${iteration}_${timestamp}_${random}`;
}

/**
 * Validate a full parameter set. Throws on the first bad field.
 *
 * `current` supplies the fraud rate when an update omits it.
 */
function resolveParameters(
    parameters: SimulationParameters,
    current?: ResolvedParameters
): ResolvedParameters {
    const resolved: ResolvedParameters = {
        recallA      : parameters.recallA,
        recallB      : parameters.recallB,
        feedbackDelay: parameters.feedbackDelay,
        fraudRate    : parameters.fraudRate ?? current?.fraudRate ?? kDEFAULT_FRAUD_RATE,
        decayRate    : parameters.decayRate ?? kDEFAULT_DECAY_RATE,
    };

    assertProbability("recallA", resolved.recallA);
    assertProbability("recallB", resolved.recallB);
    assertNonNegativeInteger("feedbackDelay", resolved.feedbackDelay);
    assertProbability("fraudRate", resolved.fraudRate);
    assertDecayRate("decayRate", resolved.decayRate);

    return Object.freeze(resolved);
}

/**
 * SimulationEngine - Thompson Sampling model routing with delayed feedback.
 *
 * @example
 * ```typescript
 * const engine = new SimulationEngine({
 *     recallA      : 0.8,
 *     recallB      : 0.6,
 *     feedbackDelay: 10,
 *     fraudRate    : 0.05,
 * });
 *
 * engine.eventBus.subscribe("prior:updated", (event) => {
 *     console.log("Prior updated:", event.data);
 * });
 *
 * engine.run(500);
 * console.log(engine.selectionCounts, engine.priors);
 *
 * // Simulated drift: Model A degrades
 * engine.updateParameters({ recallA: 0.3, recallB: 0.6, feedbackDelay: 10 });
 * engine.run(500);
 * ```
 */
export class SimulationEngine {
    private readonly logger: Logger;
    private readonly source: TransactionSource;
    private readonly classifiers: Map<string, Classifier>;
    private readonly sampler: ThompsonSampler;
    private readonly queue = new FeedbackQueue();

    private params: ResolvedParameters;
    private iteration = 0;
    private counts: ConfusionCounts = initializeMetrics();
    private readonly history: ConfusionCounts[] = [];
    private readonly selections: Map<string, number> = new Map();
    private readonly updateLog: PriorUpdateLogEntry[] = [];
    private lastSelected: string | null = null;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    /**
     * @param parameters - Initial parameters; validated before anything is built
     * @param config - Collaborators (logger, event bus, random source)
     * @throws InvalidParameterError naming the first out-of-range parameter
     */
    constructor(parameters: SimulationParameters, config: EngineConfig = {}) {
        this.params = resolveParameters(parameters);

        const random = config.random ?? Math.random;
        this.logger   = config.logger ?? createConsoleLogger("Engine");
        this.eventBus = config.eventBus ?? new InMemoryEventBus({ logger: this.logger });

        this.source = new TransactionSource(this.params.fraudRate, random);
        this.classifiers = new Map<string, Classifier>([
            [kMODEL_A, new SyntheticClassifier(kMODEL_A, this.params.recallA, random)],
            [kMODEL_B, new SyntheticClassifier(kMODEL_B, this.params.recallB, random)],
        ]);
        this.sampler = new ThompsonSampler([kMODEL_A, kMODEL_B], {
            decayRate: this.params.decayRate,
            random,
        });

        for (const name of this.classifiers.keys()) {
            this.selections.set(name, 0);
        }

        this.emit(createEvent("simulation:created", { parameters: { ...this.params } }));
        this.logger.info("Simulation created", { ...this.params });
    }

    // ========================================================================
    // Commands
    // ========================================================================

    /**
     * Execute one iteration.
     *
     * @returns Name of the classifier selected in this iteration
     */
    step(): string {
        this.iteration += 1;
        const traceId = generateTraceId(this.iteration);

        const event = this.source.generate();
        const selected = this.sampler.select();
        const classifier = this.getClassifier(selected);

        this.selections.set(selected, (this.selections.get(selected) ?? 0) + 1);

        const prediction = classifier.predict(event);
        const dueAtIteration = this.iteration + this.params.feedbackDelay;
        this.queue.enqueue(event, prediction, selected, dueAtIteration);
        this.lastSelected = selected;

        this.emit(createEvent("simulation:stepped", {
            iteration     : this.iteration,
            classifierName: selected,
            eventId       : event.id,
            label         : event.label,
            prediction,
            dueAtIteration,
        }, traceId));

        this.logger.debug("Step executed", {
            iteration     : this.iteration,
            classifierName: selected,
            label         : event.label,
            prediction,
            dueAtIteration,
            traceId,
        });

        this.resolveDue(traceId);
        return selected;
    }

    /**
     * Resolve every queued prediction due at the current iteration.
     *
     * Called by step(). Hosts may call it directly, e.g. after shortening
     * the delay, without generating a new transaction.
     *
     * @param traceId - Correlates emitted events with a step
     * @returns Prior updates recorded by this call
     */
    resolveDue(traceId?: string): PriorUpdateLogEntry[] {
        const recorded: PriorUpdateLogEntry[] = [];

        for (const item of this.queue.drainDue(this.iteration)) {
            const entry = this.resolveFeedback(item, traceId);
            if (entry) {
                recorded.push(entry);
            }
        }

        return recorded;
    }

    /**
     * Replace the simulation parameters.
     *
     * Everything is validated before anything is applied; on error the
     * engine keeps its previous configuration. Changes take effect from
     * the next step. Queued predictions keep the due iteration they were enqueued with.
     * An omitted fraudRate keeps its current value; an omitted decayRate
     * goes back to 1.0.
     *
     * @throws InvalidParameterError naming the first out-of-range parameter
     */
    updateParameters(update: SimulationParameters): void {
        const next = resolveParameters(update, this.params);
        const previous = this.params;

        this.getClassifier(kMODEL_A).updateRecallRate(next.recallA);
        this.getClassifier(kMODEL_B).updateRecallRate(next.recallB);
        this.source.setFraudRate(next.fraudRate);
        this.sampler.setDecayRate(next.decayRate);
        this.params = next;

        this.emit(createEvent("parameters:updated", {
            iteration : this.iteration,
            previous  : { ...previous },
            parameters: { ...next },
        }));

        this.logger.info("Parameters updated", { iteration: this.iteration, ...next });
    }

    /**
     * Execute `steps` sequential iterations.
     *
     * Cancellation is cooperative: the signal is checked before each step,
     * never during one.
     *
     * @param steps - Number of iterations; integer >= 0
     * @param options - Optional abort signal
     * @returns Number of iterations actually executed
     * @throws InvalidParameterError if steps is not a non-negative integer
     */
    run(steps: number, options: RunOptions = {}): number {
        assertNonNegativeInteger("steps", steps);

        this.emit(createEvent("simulation:runStarted", {
            iteration: this.iteration,
            steps,
        }));

        let executed = 0;
        while (executed < steps) {
            if (options.signal?.aborted) {
                this.emit(createEvent("simulation:runAborted", {
                    iteration: this.iteration,
                    requested: steps,
                    executed,
                }));
                this.logger.warn("Run aborted", { requested: steps, executed });
                return executed;
            }

            this.step();
            executed++;
        }

        this.emit(createEvent("simulation:runCompleted", {
            iteration: this.iteration,
            executed,
        }));

        this.logger.debug("Run completed", { iteration: this.iteration, executed });
        return executed;
    }

    // ========================================================================
    // Read model
    // ========================================================================

    get currentIteration(): number {
        return this.iteration;
    }

    get parameters(): ResolvedParameters {
        return this.params;
    }

    get priors(): Record<string, Prior> {
        return this.sampler.priors;
    }

    /** Latest confusion counts */
    get metrics(): ConfusionCounts {
        return this.counts;
    }

    /** One snapshot per scored feedback, oldest first */
    get metricsHistory(): readonly ConfusionCounts[] {
        return this.history.slice();
    }

    get selectionCounts(): Record<string, number> {
        return Object.fromEntries(this.selections);
    }

    get priorUpdateLog(): readonly PriorUpdateLogEntry[] {
        return this.updateLog.slice();
    }

    get lastSelectedClassifier(): string | null {
        return this.lastSelected;
    }

    get pendingFeedbackCount(): number {
        return this.queue.length;
    }

    /** Predictions still waiting for feedback, oldest first */
    get pendingFeedback(): readonly PendingFeedback[] {
        return this.queue.pending();
    }

    /**
     * The full read model in one object.
     */
    snapshot(): SimulationSnapshot {
        return {
            currentIteration      : this.iteration,
            parameters            : this.params,
            priors                : this.priors,
            metrics               : this.counts,
            metricsHistory        : this.metricsHistory,
            selectionCounts       : this.selectionCounts,
            priorUpdateLog        : this.priorUpdateLog,
            lastSelectedClassifier: this.lastSelected,
            pendingFeedbackCount  : this.queue.length,
        };
    }

    // ========================================================================
    // Internals
    // ========================================================================

    /**
     * Score one drained prediction. Returns null for legitimate transactions.
     */
    private resolveFeedback(item: PendingFeedback, traceId?: string): PriorUpdateLogEntry | null {
        const { event, prediction, classifierName } = item;
        const scored = event.label === 1;

        this.emit(createEvent("feedback:resolved", {
            iteration     : this.iteration,
            classifierName,
            eventId       : event.id,
            label         : event.label,
            prediction,
            dueAtIteration: item.dueAtIteration,
            scored,
        }, traceId));

        if (!scored) {
            return null;
        }

        const outcome: BinaryLabel = prediction === 1 ? 1 : 0;
        const before = this.sampler.getPrior(classifierName);
        const after = this.sampler.updatePrior(classifierName, outcome);

        const entry: PriorUpdateLogEntry = {
            iteration: this.iteration,
            classifierName,
            outcome  : outcome === 1 ? "TP" : "FN",
            oldAlpha : before.alpha,
            oldBeta  : before.beta,
            newAlpha : after.alpha,
            newBeta  : after.beta,
        };
        Object.freeze(entry);
        this.updateLog.push(entry);

        this.counts = applyPrediction(this.counts, event, prediction);
        this.history.push(this.counts);

        this.emit(createEvent("prior:updated", { ...entry }, traceId));
        this.logger.debug("Prior updated", { ...entry, traceId });

        return entry;
    }

    private getClassifier(name: string): Classifier {
        const classifier = this.classifiers.get(name);
        if (!classifier) {
            throw new InvalidParameterError("classifierName", name, `Unknown classifier: ${name}`);
        }
        return classifier;
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
