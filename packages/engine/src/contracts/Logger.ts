/**
 * Logger Contract
 *
 * Structured logger shared by the engine, the event bus and hosts.
 * Messages are short; context goes in the data object.
 */

/**
 * Logger interface.
 */
export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Log levels in increasing severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const kLEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info : 1,
    warn : 2,
    error: 3,
};

/**
 * Type guard for log level strings (e.g. from the environment).
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && Object.hasOwn(kLEVEL_ORDER, value);
}

/**
 * Create a console-backed logger.
 *
 * @param prefix - Tag printed before each message, e.g. "Engine"
 * @param minLevel - Messages below this level are dropped (default: "info")
 */
export function createConsoleLogger(prefix: string, minLevel: LogLevel = "info"): Logger {
    const enabled = (level: LogLevel): boolean => kLEVEL_ORDER[level] >= kLEVEL_ORDER[minLevel];

    return {
        debug: (msg, data) => {
            if (enabled("debug")) console.debug(`[DEBUG] [${prefix}] ${msg}`, data ?? "");
        },
        info: (msg, data) => {
            if (enabled("info")) console.info(`[INFO] [${prefix}] ${msg}`, data ?? "");
        },
        warn: (msg, data) => {
            if (enabled("warn")) console.warn(`[WARN] [${prefix}] ${msg}`, data ?? "");
        },
        error: (msg, data) => {
            if (enabled("error")) console.error(`[ERROR] [${prefix}] ${msg}`, data ?? "");
        },
    };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};
