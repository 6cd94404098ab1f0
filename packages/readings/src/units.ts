/**
 * Glucose unit conversion
 */

/** mg/dL per mmol/L */
export const MMOL_TO_MGDL = 18;

/** Unit the feed reports glucose in */
export const NATIVE_GLUCOSE_UNITS = "mmol/L";

/**
 * Convert mmol/L to whole mg/dL, truncating toward zero (5.5 -> 99, -0.1 -> -1)
 */
export function mmolToMgDl(mmol: number): number {
  const mgdl = Math.trunc(mmol * MMOL_TO_MGDL);
  // Avoid "-0" for small negatives
  return mgdl === 0 ? 0 : mgdl;
}

/**
 * Whether a units field names the native unit. Missing units are assumed
 * native; anything that is not a string is not.
 */
export function isNativeGlucoseUnits(units: unknown): boolean {
  if (units === undefined || units === null || units === "") {
    return true;
  }
  return typeof units === "string" && units.toLowerCase() === NATIVE_GLUCOSE_UNITS.toLowerCase();
}
