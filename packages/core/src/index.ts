/**
 * @glucose-report/core
 *
 * Shared data model and error taxonomy
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./mask.js";
