/**
 * Finger stick (smbg) extractor
 *
 * Walks the measurement feed once, in arrival order, keeping only smbg
 * entries and reducing each to date, time and mg/dL value.
 */

import { SUPPORTED_SUBTYPE, type NormalizedReading } from "@glucose-report/core";
import type { RawMeasurement } from "@glucose-report/tidepool";
import { isNativeGlucoseUnits, mmolToMgDl } from "../units.js";
import { splitDeviceTime } from "./device-time.js";

export type SkipReason = "missing-device-time" | "missing-value";

export interface ExtractOptions {
  /** Called for smbg entries that cannot be normalized */
  onSkip?: (measurement: RawMeasurement, reason: SkipReason) => void;
  /**
   * Called for smbg entries whose units are not mmol/L.
   * They are still converted with the mmol/L factor.
   */
  onUnitMismatch?: (measurement: RawMeasurement) => void;
}

/**
 * Create a frozen reading
 */
export function createReading(date: string, time: string, mgdl: number): NormalizedReading {
  return Object.freeze({ date, time, value: String(mgdl) });
}

/**
 * Extract finger stick readings from the feed.
 *
 * Other subtypes are dropped silently. Output order matches input order;
 * an empty result is valid.
 */
export function extractSmbgReadings(
  measurements: readonly RawMeasurement[],
  options: ExtractOptions = {}
): NormalizedReading[] {
  const readings: NormalizedReading[] = [];

  for (const measurement of measurements) {
    if (measurement.type !== SUPPORTED_SUBTYPE) {
      continue;
    }

    const { deviceTime } = measurement;
    const dateTime = typeof deviceTime === "string" ? splitDeviceTime(deviceTime) : null;
    if (!dateTime) {
      options.onSkip?.(measurement, "missing-device-time");
      continue;
    }

    const { value } = measurement;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      options.onSkip?.(measurement, "missing-value");
      continue;
    }

    if (!isNativeGlucoseUnits(measurement.units)) {
      options.onUnitMismatch?.(measurement);
    }

    readings.push(createReading(dateTime.date, dateTime.time, mmolToMgDl(value)));
  }

  return readings;
}
