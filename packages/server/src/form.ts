/**
 * Report request form
 *
 * Fields posted by the home page: useremail, password, startdate,
 * enddate (both optional, YYYY-MM-DD) and datatype.
 */

import { z } from "zod";
import { SUPPORTED_SUBTYPE, type Credentials, type DateRange } from "@glucose-report/core";
import { RequestValidationError } from "./errors.js";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
  if (!ISO_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

const optionalDate = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined)
  .refine((value) => value === undefined || isCalendarDate(value), {
    message: "Use a YYYY-MM-DD date",
  });

export const ReportFormSchema = z
  .object({
    useremail: z.string({ required_error: "Required" }).trim().min(1, "Required"),
    password: z.string({ required_error: "Required" }).min(1, "Required"),
    startdate: optionalDate,
    enddate: optionalDate,
    datatype: z
      .string()
      .optional()
      .transform((value) => value?.trim() || SUPPORTED_SUBTYPE)
      .refine((value) => value === SUPPORTED_SUBTYPE, {
        message: `Only "${SUPPORTED_SUBTYPE}" readings are supported`,
      }),
  })
  .refine((form) => !form.startdate || !form.enddate || form.startdate <= form.enddate, {
    message: "Start date is after end date",
    path: ["enddate"],
  });

export interface ReportRequest {
  credentials: Credentials;
  range: DateRange;
  subtype: string;
}

/**
 * Parse a urlencoded form body into a report request
 *
 * @throws RequestValidationError listing every problem found
 */
export function parseReportForm(body: string): ReportRequest {
  const fields = Object.fromEntries(new URLSearchParams(body));
  const result = ReportFormSchema.safeParse(fields);

  if (!result.success) {
    throw new RequestValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const form = result.data;
  return {
    credentials: { identifier: form.useremail, secret: form.password },
    range: { start: form.startdate, end: form.enddate },
    subtype: form.datatype,
  };
}
