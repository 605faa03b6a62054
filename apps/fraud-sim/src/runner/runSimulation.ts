/**
 * @fileoverview Scheduled simulation runner
 *
 * Drives a SimulationEngine for a number of iterations in batches,
 * applying scheduled parameter changes at their iteration and yielding
 * to the event loop between batches so a SIGINT handler can abort the run.
 *
 * @module runner/runSimulation
 */

import { setImmediate as yieldToEventLoop } from "timers/promises";
import { assertNonNegativeInteger, type SimulationEngine } from "@bandit-router/engine";
import type { ScheduledChange } from "../config/index.js";

const kDEFAULT_BATCH_SIZE = 250;

export interface RunSimulationOptions {
    /** Iterations to execute in this run */
    readonly steps: number;

    /** Parameter changes keyed by absolute iteration */
    readonly schedule?: readonly ScheduledChange[];

    /** Stops the run between steps */
    readonly signal?: AbortSignal;

    /** Iterations per engine.run() call (default: 250) */
    readonly batchSize?: number;
}

export interface RunSimulationResult {
    readonly executed: number;
    readonly aborted: boolean;
    readonly appliedChanges: readonly ScheduledChange[];
}

/**
 * Apply one scheduled change on top of the engine's current parameters.
 */
export function applyScheduledChange(engine: SimulationEngine, change: ScheduledChange): void {
    const current = engine.parameters;

    engine.updateParameters({
        recallA      : change.recallA ?? current.recallA,
        recallB      : change.recallB ?? current.recallB,
        feedbackDelay: change.feedbackDelay ?? current.feedbackDelay,
        fraudRate    : change.fraudRate ?? current.fraudRate,
        decayRate    : change.decayRate ?? current.decayRate,
    });
}

/**
 * Run the engine for `steps` iterations.
 *
 * A change with `at: n` is applied right before iteration n executes.
 * Changes at or before the next iteration when the run starts apply
 * immediately; changes past the last iteration of the run are skipped.
 *
 * @throws InvalidParameterError if steps, batchSize or a change is out of range
 */
export async function runSimulation(
    engine: SimulationEngine,
    options: RunSimulationOptions
): Promise<RunSimulationResult> {
    const { steps, signal } = options;
    assertNonNegativeInteger("steps", steps);

    const batchSize = options.batchSize ?? kDEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
        throw new RangeError("batchSize must be a positive integer");
    }

    const pending = [...(options.schedule ?? [])].sort((a, b) => a.at - b.at);
    const applied: ScheduledChange[] = [];
    let executed = 0;

    while (executed < steps) {
        while (pending.length > 0 && pending[0].at <= engine.currentIteration + 1) {
            const change = pending[0];
            applyScheduledChange(engine, change);
            applied.push(change);
            pending.shift();
        }

        let batch = Math.min(batchSize, steps - executed);
        if (pending.length > 0) {
            batch = Math.min(batch, pending[0].at - 1 - engine.currentIteration);
        }

        const ran = engine.run(batch, { signal });
        executed += ran;
        if (ran < batch) {
            return { executed, aborted: true, appliedChanges: applied };
        }

        await yieldToEventLoop();
    }

    return { executed, aborted: false, appliedChanges: applied };
}
