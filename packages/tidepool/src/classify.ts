/**
 * Response classifier for the data endpoint.
 *
 * The service uses HTTP 200 for both the measurement array and some error
 * objects, so the body's shape is the only discriminator: try the feed
 * schema first, then the error schema.
 */

import { MalformedPayloadError, ServiceReportedError } from "@glucose-report/core";
import {
  MeasurementFeedSchema,
  ServiceErrorSchema,
  type ClassifiedPayload,
  type RawMeasurement,
} from "./types.js";

const PREVIEW_LENGTH = 120;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Classify a raw response body.
 *
 * @throws MalformedPayloadError when the body is not JSON, or is JSON of
 * neither shape
 */
export function classifyPayload(body: Uint8Array | string): ClassifiedPayload {
  const text = typeof body === "string" ? body : Buffer.from(body).toString("utf-8");

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new MalformedPayloadError(
      `Response body is not JSON: ${error instanceof Error ? error.message : String(error)}`,
      preview(text)
    );
  }

  const feed = MeasurementFeedSchema.safeParse(json);
  if (feed.success) {
    return { kind: "success", measurements: feed.data };
  }

  const serviceError = ServiceErrorSchema.safeParse(json);
  if (serviceError.success) {
    return { kind: "failure", error: serviceError.data };
  }

  throw new MalformedPayloadError(
    Array.isArray(json)
      ? `Measurement array did not match the expected schema: ${feed.error.issues[0]?.message ?? "invalid"}`
      : "Response body is neither a measurement array nor an error object",
    preview(text)
  );
}

/**
 * Unwrap a classified payload, turning a service error into an exception
 */
export function assertMeasurements(payload: ClassifiedPayload): RawMeasurement[] {
  if (payload.kind === "failure") {
    throw new ServiceReportedError(payload.error);
  }
  return payload.measurements;
}
