/**
 * @fileoverview Command-line argument parsing
 *
 * @module cli/args
 */

import type { ConfigOverrides } from "../config/index.js";

export interface ParsedArgs {
    positional: string[];
    flags: Record<string, boolean>;
    options: Record<string, string>;
}

/**
 * Options the simulator understands.
 */
export interface CliOptions {
    readonly configPath?: string;
    readonly verbose: boolean;
    readonly help: boolean;
    readonly overrides: ConfigOverrides;
}

/** Numeric options and the profile field each one overrides */
const kNUMERIC_OPTIONS = {
    "steps"     : "steps",
    "seed"      : "seed",
    "recall-a"  : "recallA",
    "recall-b"  : "recallB",
    "delay"     : "feedbackDelay",
    "fraud-rate": "fraudRate",
    "decay-rate": "decayRate",
    "updates"   : "reportUpdates",
} as const satisfies Record<string, keyof ConfigOverrides>;

type NumericOption = keyof typeof kNUMERIC_OPTIONS;

type MutableOverrides = { -readonly [K in keyof ConfigOverrides]: ConfigOverrides[K] };

const kKNOWN_FLAGS = new Set(["verbose", "v", "help", "h"]);

export const kUSAGE = `Usage: fraud-sim [options]

Options:
  --config <path>       Simulation profile (default: config/simulation.yml)
  --steps <n>           Iterations to run
  --seed <n>            Seed for a reproducible run
  --recall-a <p>        Recall of Model A, 0..1
  --recall-b <p>        Recall of Model B, 0..1
  --delay <n>           Feedback delay in iterations
  --fraud-rate <p>      Fraud rate, 0..1
  --decay-rate <p>      Prior decay per update, (0, 1]
  --updates <n>         Prior updates shown in the report
  -v, --verbose         Log every step and feedback resolution
  -h, --help            Show this message`;

export function parseArgs(args: string[]): ParsedArgs {
    const result: ParsedArgs = {
        positional: [],
        flags     : {},
        options   : {},
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (arg.startsWith("--")) {
            const key = arg.slice(2);
            const next = args[i + 1];

            // A following token that isn't itself an option is the value
            if (next !== undefined && !next.startsWith("--")) {
                result.options[key] = next;
                i++;
            }
            else {
                result.flags[key] = true;
            }
        }
        else if (arg.startsWith("-") && arg.length > 1) {
            result.flags[arg.slice(1)] = true;
        }
        else {
            result.positional.push(arg);
        }
    }

    return result;
}

export function hasFlag(args: ParsedArgs, ...names: string[]): boolean {
    return names.some((name) => args.flags[name] === true);
}

export function getOption(args: ParsedArgs, ...names: string[]): string | undefined {
    for (const name of names) {
        const value = args.options[name];
        if (value !== undefined) {
            return value;
        }
    }
    return undefined;
}

function isNumericOption(name: string): name is NumericOption {
    return Object.hasOwn(kNUMERIC_OPTIONS, name);
}

function parseNumber(name: string, raw: string): number {
    const value = Number(raw);
    if (raw.trim() === "" || !Number.isFinite(value)) {
        throw new Error(`--${name} expects a number, got "${raw}"`);
    }
    return value;
}

/**
 * Turn raw arguments into simulator options.
 *
 * Only syntax is checked here; ranges are checked when the overrides
 * are applied to the profile.
 *
 * @throws Error on unknown options, flags missing a value, or non-numeric values
 */
export function readCliOptions(argv: string[]): CliOptions {
    const parsed = parseArgs(argv);

    if (parsed.positional.length > 0) {
        throw new Error(`Unexpected argument: ${parsed.positional[0]}`);
    }

    for (const flag of Object.keys(parsed.flags)) {
        if (flag === "config" || isNumericOption(flag)) {
            throw new Error(`Missing value for --${flag}`);
        }
        if (!kKNOWN_FLAGS.has(flag)) {
            throw new Error(`Unknown option: ${flag.length === 1 ? "-" : "--"}${flag}`);
        }
    }

    const overrides: MutableOverrides = {};
    for (const [name, raw] of Object.entries(parsed.options)) {
        if (name === "config") {
            continue;
        }
        if (!isNumericOption(name)) {
            throw new Error(`Unknown option: --${name}`);
        }
        overrides[kNUMERIC_OPTIONS[name]] = parseNumber(name, raw);
    }

    return {
        configPath: getOption(parsed, "config"),
        verbose   : hasFlag(parsed, "verbose", "v"),
        help      : hasFlag(parsed, "help", "h"),
        overrides,
    };
}
