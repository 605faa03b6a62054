/**
 * @fileoverview Error barrel exports
 *
 * @module @bandit-router/engine/errors
 */

export {
    InvalidParameterError,
    assertProbability,
    assertDecayRate,
    assertNonNegativeInteger,
} from "./InvalidParameterError.js";
