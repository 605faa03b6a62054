/**
 * @fileoverview CLI barrel exports
 *
 * @module cli
 */

export {
    parseArgs,
    hasFlag,
    getOption,
    readCliOptions,
    kUSAGE,
    type CliOptions,
    type ParsedArgs,
} from "./args.js";
