/**
 * Tidepool API payload schemas
 *
 * The data endpoint answers HTTP 200 with either a measurement array or,
 * for some failures, an error object. Both shapes are modelled here so the
 * classifier can tell them apart by structure.
 */

import { z } from "zod";
import type { ServiceError } from "@glucose-report/core";

/**
 * One element of the measurement feed.
 *
 * Every subtype (smbg, cbg, basal, pumpSettings, ...) shares this array, each
 * with its own sparse fields, and the same field name can hold a different
 * type per subtype (pumpSettings carries an object in `units`). Only the
 * array-of-objects shape is checked here; field types are checked by the
 * extractor for the subtype it reads.
 */
export const RawMeasurementSchema = z
  .object({
    /** Subtype tag, e.g. "smbg" */
    type: z.unknown(),
    /** Device-local timestamp, e.g. "2021-03-17T08:33:00" */
    deviceTime: z.unknown(),
    /** Reading in the feed's native unit (mmol/L for glucose) */
    value: z.unknown(),
    units: z.unknown(),
  })
  .passthrough();

export type RawMeasurement = z.infer<typeof RawMeasurementSchema>;

export const MeasurementFeedSchema = z.array(RawMeasurementSchema);

/**
 * Error object returned in place of the feed (e.g. 403 on bad credentials)
 */
export const ServiceErrorSchema = z
  .object({
    status: z.number().int().optional(),
    id: z.string().optional(),
    code: z.string().optional(),
    message: z.string().optional(),
  })
  .refine(
    (body) =>
      body.status !== undefined || body.code !== undefined || body.message !== undefined,
    { message: "Expected at least one of status, code or message" }
  )
  .transform(
    (body): ServiceError => ({
      status: body.status ?? 0,
      id: body.id ?? "",
      code: body.code ?? "",
      message: body.message ?? "",
    })
  );

/** Result of classifying a data response body */
export type ClassifiedPayload =
  | { kind: "success"; measurements: RawMeasurement[] }
  | { kind: "failure"; error: ServiceError };

/** Options shared by login and data calls */
export interface TidepoolClientOptions {
  /** API root (default: https://int-api.tidepool.org) */
  baseUrl?: string;
  /** Per-call timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}
