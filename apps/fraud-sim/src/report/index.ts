/**
 * @fileoverview Report barrel exports
 *
 * @module report
 */

export { formatReport, formatPriorUpdate, readPriorUpdate, type ReportOptions } from "./formatReport.js";
