/**
 * @glucose-report/readings
 *
 * Normalizes the measurement feed into display-ready finger stick readings
 *
 * @example
 * ```typescript
 * import { extractSmbgReadings } from "@glucose-report/readings";
 *
 * const readings = extractSmbgReadings(measurements);
 * ```
 */

export * from "./units.js";
export * from "./parsers/index.js";
