/**
 * Report pipeline: login -> fetch -> classify -> extract -> render
 *
 * Every call owns its session, body, readings and renderer. Errors from any
 * stage propagate to the caller as typed ReportErrors.
 */

import { maskIdentifier, type NormalizedReading } from "@glucose-report/core";
import {
  login,
  fetchMeasurements,
  classifyPayload,
  assertMeasurements,
  type TidepoolClientOptions,
} from "@glucose-report/tidepool";
import { extractSmbgReadings } from "@glucose-report/readings";
import { ReportRenderer, type RenderedReport } from "@glucose-report/report";
import type { ReportRequest } from "./form.js";

export interface PipelineOptions {
  client?: TidepoolClientOptions;
  /** Renderer factory, called once per report */
  createRenderer?: () => ReportRenderer;
}

export interface ReportResult {
  readings: NormalizedReading[];
  report: RenderedReport;
}

export async function generateReport(
  request: ReportRequest,
  options: PipelineOptions = {}
): Promise<ReportResult> {
  const who = maskIdentifier(request.credentials.identifier);

  const session = await login(request.credentials, options.client);
  const body = await fetchMeasurements(session, request.subtype, request.range, options.client);
  const payload = classifyPayload(body);
  if (payload.kind === "failure") {
    console.error(
      `Tidepool error for ${who}: ${payload.error.status} ${payload.error.code} ${payload.error.message}`
    );
  }
  const measurements = assertMeasurements(payload);

  let skipped = 0;
  let otherUnits = 0;
  const readings = extractSmbgReadings(measurements, {
    onSkip: (measurement, reason) => {
      skipped++;
      console.warn(`Skipping smbg entry (${reason}): deviceTime=${String(measurement.deviceTime ?? "none")}`);
    },
    onUnitMismatch: () => {
      otherUnits++;
    },
  });

  if (otherUnits > 0) {
    console.warn(`${otherUnits} smbg readings not in mmol/L were converted as mmol/L`);
  }
  if (readings.length === 0) {
    console.log(`No ${request.subtype} readings returned for ${who}`);
  } else {
    console.log(
      `Extracted ${readings.length} of ${measurements.length} entries for ${who} (${skipped} skipped)`
    );
  }

  const renderer = options.createRenderer?.() ?? new ReportRenderer();
  const report = await renderer.render(readings);

  return { readings, report };
}
