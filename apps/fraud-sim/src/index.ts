/**
 * @fileoverview Fraud Sim - Main Entry Point
 *
 * Runs the Thompson Sampling model routing simulation from the command
 * line and prints a text report of the final state.
 *
 * Profile precedence, lowest first:
 * 1. Built-in defaults
 * 2. YAML profile (./config/simulation.yml, FRAUD_SIM_CONFIG or --config)
 * 3. Environment (FRAUD_SIM_SEED)
 * 4. CLI flags
 *
 * @module fraud-sim
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import {
    InvalidParameterError,
    SimulationEngine,
    createConsoleLogger,
    createSeededRandom,
    type Logger,
} from "@bandit-router/engine";

import { readEnvironment, resolveConfig, resolveLogLevel } from "./config/index.js";
import { kUSAGE, readCliOptions } from "./cli/index.js";
import { runSimulation } from "./runner/index.js";
import { formatPriorUpdate, formatReport, readPriorUpdate } from "./report/index.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const kDEFAULT_PROFILE = join(__dirname, "..", "config", "simulation.yml");

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const cli = readCliOptions(process.argv.slice(2));
    if (cli.help) {
        console.log(kUSAGE);
        return;
    }

    const environment = readEnvironment();
    const logger: Logger = createConsoleLogger("fraud-sim", resolveLogLevel(environment, cli.verbose));

    const config = resolveConfig({
        defaultPath  : kDEFAULT_PROFILE,
        cliConfigPath: cli.configPath,
        cliOverrides : cli.overrides,
        environment,
        logger,
    });

    const engine = new SimulationEngine(
        {
            recallA      : config.recallA,
            recallB      : config.recallB,
            feedbackDelay: config.feedbackDelay,
            fraudRate    : config.fraudRate,
            decayRate    : config.decayRate,
        },
        {
            logger,
            random: config.seed !== undefined ? createSeededRandom(config.seed) : undefined,
        }
    );

    if (cli.verbose) {
        engine.eventBus.subscribe("prior:updated", (event) => {
            const entry = readPriorUpdate(event.data);
            if (entry) {
                console.log(`[PRIOR] ${formatPriorUpdate(entry)}`);
            }
        });
    }

    // Abort between batches on Ctrl+C; the partial run is still reported
    const controller = new AbortController();
    process.once("SIGINT", () => {
        console.log("\nStopping after the current batch...");
        controller.abort();
    });

    console.log(`Running ${config.steps} iterations${config.seed !== undefined ? ` (seed ${config.seed})` : ""}`);

    const result = await runSimulation(engine, {
        steps   : config.steps,
        schedule: config.schedule,
        signal  : controller.signal,
    });

    console.log(formatReport(engine.snapshot(), { priorUpdates: config.reportUpdates }));

    if (result.aborted) {
        console.log(`\nRun aborted after ${result.executed} of ${config.steps} iterations.`);
        process.exitCode = 130;
    }
}

main().catch((error: unknown) => {
    if (error instanceof InvalidParameterError) {
        console.error(`[FATAL] Invalid parameter '${error.parameter}': ${error.message}`);
    }
    else {
        console.error("[FATAL]", error instanceof Error ? error.message : error);
    }
    process.exitCode = 1;
});
