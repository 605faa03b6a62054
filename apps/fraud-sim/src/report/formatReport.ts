/**
 * @fileoverview Plain-text simulation report
 *
 * Renders the engine read model: selection counts, current priors,
 * the most recent prior updates and overall recall and precision.
 *
 * @module report/formatReport
 */

import {
    calculatePrecision,
    calculateRecall,
    recallSeries,
    summarizePrior,
    type PriorUpdateLogEntry,
    type SimulationSnapshot,
} from "@bandit-router/engine";

export interface ReportOptions {
    /** Prior updates to list, newest last; 0 hides the section (default: 10) */
    readonly priorUpdates?: number;

    /** Points of the recall trend to list (default: 5) */
    readonly trendPoints?: number;
}

const kRULE = "=".repeat(60);

function fixed(value: number): string {
    return value.toFixed(2);
}

/**
 * Read a prior update back from a `prior:updated` event payload.
 * Returns null when the payload does not carry one.
 */
export function readPriorUpdate(data: Record<string, unknown> | undefined): PriorUpdateLogEntry | null {
    if (!data) {
        return null;
    }

    const { iteration, classifierName, outcome, oldAlpha, oldBeta, newAlpha, newBeta } = data;
    if (
        typeof iteration !== "number"
        || typeof classifierName !== "string"
        || (outcome !== "TP" && outcome !== "FN")
        || typeof oldAlpha !== "number"
        || typeof oldBeta !== "number"
        || typeof newAlpha !== "number"
        || typeof newBeta !== "number"
    ) {
        return null;
    }

    return { iteration, classifierName, outcome, oldAlpha, oldBeta, newAlpha, newBeta };
}

/**
 * Format one prior update log entry.
 *
 * @example
 * ```typescript
 * formatPriorUpdate(entry);
 * // "#12  Model A  TP  (1.00, 1.00) -> (2.00, 1.00)"
 * ```
 */
export function formatPriorUpdate(entry: PriorUpdateLogEntry): string {
    return `#${entry.iteration}  ${entry.classifierName}  ${entry.outcome}  `
        + `(${fixed(entry.oldAlpha)}, ${fixed(entry.oldBeta)}) -> `
        + `(${fixed(entry.newAlpha)}, ${fixed(entry.newBeta)})`;
}

/**
 * Render a snapshot as report lines.
 */
export function formatReport(snapshot: SimulationSnapshot, options: ReportOptions = {}): string {
    const priorUpdates = options.priorUpdates ?? 10;
    const trendPoints = options.trendPoints ?? 5;

    const names = Object.keys(snapshot.selectionCounts);
    const width = Math.max(0, ...names.map((name) => name.length));

    const lines: string[] = [
        kRULE,
        `Iteration: ${snapshot.currentIteration}`,
        snapshot.lastSelectedClassifier === null
            ? "No model selected yet."
            : `Last selected model: ${snapshot.lastSelectedClassifier}`,
        kRULE,
        "",
        "Model selection counts:",
    ];

    for (const name of names) {
        lines.push(`  ${name.padEnd(width)}  ${snapshot.selectionCounts[name]}`);
    }

    lines.push("", "Model priors:");
    for (const [name, prior] of Object.entries(snapshot.priors)) {
        const summary = summarizePrior(prior);
        lines.push(
            `  ${name.padEnd(width)}  alpha=${fixed(summary.alpha)}  beta=${fixed(summary.beta)}  mean=${summary.mean.toFixed(3)}`
        );
    }

    if (priorUpdates > 0) {
        const recent = snapshot.priorUpdateLog.slice(-priorUpdates);
        lines.push("");
        if (recent.length === 0) {
            lines.push("No prior updates yet.");
        }
        else {
            lines.push(`Recent prior updates (last ${recent.length}):`);
            for (const entry of recent) {
                lines.push(`  ${formatPriorUpdate(entry)}`);
            }
        }
    }

    lines.push(
        "",
        `Overall recall: ${fixed(calculateRecall(snapshot.metrics))}`,
        `Overall precision: ${fixed(calculatePrecision(snapshot.metrics))}`,
    );

    const trend = trendPoints > 0 ? recallSeries(snapshot.metricsHistory).slice(-trendPoints) : [];
    if (trend.length > 0) {
        lines.push(`Recall trend: ${trend.map(fixed).join(" -> ")}`);
    }

    lines.push(`Pending feedback: ${snapshot.pendingFeedbackCount}`);

    return lines.join("\n");
}
