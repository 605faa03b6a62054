/**
 * @fileoverview InvalidParameterError
 *
 * The single error kind raised by the engine: a caller passed a value
 * outside its domain. Validation runs before any state changes, so a
 * thrown error leaves the engine at its last valid configuration.
 *
 * @module @bandit-router/engine/errors/InvalidParameterError
 */

/**
 * Raised when a construction or update argument is out of range.
 *
 * @example
 * ```typescript
 * try {
 *     engine.updateParameters({ recallA: 1.5, recallB: 0.5, feedbackDelay: 3 });
 * }
 * catch (error) {
 *     if (error instanceof InvalidParameterError) {
 *         console.error(`${error.parameter}: ${error.message}`);
 *     }
 * }
 * ```
 */
export class InvalidParameterError extends Error {
    /** Name of the offending parameter */
    readonly parameter: string;

    /** The rejected value */
    readonly value: unknown;

    constructor(parameter: string, value: unknown, message: string) {
        super(message);
        this.name      = "InvalidParameterError";
        this.parameter = parameter;
        this.value     = value;
    }
}

/**
 * Require a finite number in the closed interval [0, 1].
 *
 * @throws InvalidParameterError naming `parameter`
 */
export function assertProbability(parameter: string, value: number): void {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
        throw new InvalidParameterError(parameter, value, `${parameter} must be between 0 and 1.`);
    }
}

/**
 * Require a decay rate in the half-open interval (0, 1].
 *
 * @throws InvalidParameterError naming `parameter`
 */
export function assertDecayRate(parameter: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0 || value > 1) {
        throw new InvalidParameterError(
            parameter,
            value,
            `${parameter} must be between 0 (exclusive) and 1 (inclusive).`
        );
    }
}

/**
 * Require a non-negative integer, e.g. a delay in iterations.
 *
 * @throws InvalidParameterError naming `parameter`
 */
export function assertNonNegativeInteger(parameter: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new InvalidParameterError(parameter, value, `${parameter} must be a non-negative integer.`);
    }
}
