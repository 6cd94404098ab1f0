/**
 * Error taxonomy for a single report request.
 *
 * Every stage throws one of these; none are retried. The HTTP layer maps
 * `kind` to a response page.
 */

import type { ServiceError } from "./types.js";

export type ReportErrorKind =
  | "auth"
  | "fetch"
  | "malformed-payload"
  | "service-reported";

export abstract class ReportError extends Error {
  abstract readonly kind: ReportErrorKind;
}

/** Login returned a non-200 status or an unusable body */
export class AuthError extends ReportError {
  readonly kind = "auth";

  constructor(
    public readonly status: number,
    public readonly statusText: string
  ) {
    super(`Authorization failed: ${status} ${statusText}`.trim());
    this.name = "AuthError";
  }
}

/** Data query returned a non-200 status or never completed */
export class FetchError extends ReportError {
  readonly kind = "fetch";

  constructor(
    public readonly status: number,
    public readonly statusText: string
  ) {
    super(`Data request failed: ${status} ${statusText}`.trim());
    this.name = "FetchError";
  }
}

/** Body is neither a measurement array nor a service error object */
export class MalformedPayloadError extends ReportError {
  readonly kind = "malformed-payload";

  constructor(
    message: string,
    /** First characters of the body, for logs */
    public readonly preview: string
  ) {
    super(message);
    this.name = "MalformedPayloadError";
  }
}

/** The service answered with its own error object */
export class ServiceReportedError extends ReportError {
  readonly kind = "service-reported";

  constructor(public readonly serviceError: ServiceError) {
    super(
      `Service reported ${serviceError.status} ${serviceError.code}: ${serviceError.message}`
    );
    this.name = "ServiceReportedError";
  }
}

export type AnyReportError =
  | AuthError
  | FetchError
  | MalformedPayloadError
  | ServiceReportedError;

export function isReportError(error: unknown): error is AnyReportError {
  return (
    error instanceof AuthError ||
    error instanceof FetchError ||
    error instanceof MalformedPayloadError ||
    error instanceof ServiceReportedError
  );
}
