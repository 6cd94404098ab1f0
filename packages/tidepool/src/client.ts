/**
 * Tidepool API client
 *
 * Two calls per report: a Basic-auth login that yields a session token and
 * account id, then one data query for a single measurement subtype.
 * Failures are thrown as typed errors; nothing is retried.
 */

import {
  AuthError,
  FetchError,
  maskIdentifier,
  type Credentials,
  type DateRange,
  type Session,
} from "@glucose-report/core";
import type { TidepoolClientOptions } from "./types.js";

export const TIDEPOOL_BASE_URL = "https://int-api.tidepool.org";
export const SESSION_TOKEN_HEADER = "x-tidepool-session-token";

const DEFAULT_TIMEOUT_MS = 30000;

/** Fixed time of day the service expects on date-range bounds */
const DATE_BOUND_TIME = "T01:00:00.000Z";

function resolveOptions(options: TidepoolClientOptions = {}): Required<TidepoolClientOptions> {
  return {
    baseUrl: (options.baseUrl ?? TIDEPOOL_BASE_URL).replace(/\/+$/, ""),
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };
}

/**
 * Describe a fetch that never produced a response (network error or timeout)
 */
function describeRequestFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `No response within ${timeoutMs}ms`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * Account ids arrive as JSON of any type; accept scalars only.
 */
function coerceAccountId(value: unknown): string | null {
  if (typeof value === "string") {
    return value.length > 0 ? value : null;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return null;
}

/**
 * Build the date-range part of the data query string.
 *
 * Each present bound becomes `&startDate=` / `&endDate=` followed by the
 * date and a fixed `T01:00:00.000Z`, start first.
 */
export function buildDateRangeQuery(range: DateRange = {}): string {
  let query = "";
  if (range.start) {
    query += `&startDate=${range.start}${DATE_BOUND_TIME}`;
  }
  if (range.end) {
    query += `&endDate=${range.end}${DATE_BOUND_TIME}`;
  }
  return query;
}

/**
 * Build the full data query URL for an account and subtype
 */
export function buildDataUrl(
  baseUrl: string,
  accountId: string,
  subtype: string,
  range: DateRange = {}
): string {
  return (
    `${baseUrl}/data/${encodeURIComponent(accountId)}` +
    `?type=${encodeURIComponent(subtype)}` +
    buildDateRangeQuery(range)
  );
}

/**
 * Log in with e-mail and password.
 *
 * The token comes from the `x-tidepool-session-token` response header and
 * the account id from the body's `userid` field. Both must be present.
 */
export async function login(
  credentials: Credentials,
  options?: TidepoolClientOptions
): Promise<Session> {
  const { baseUrl, timeoutMs } = resolveOptions(options);
  const basic = Buffer.from(`${credentials.identifier}:${credentials.secret}`).toString(
    "base64"
  );

  console.log(`Tidepool login for ${maskIdentifier(credentials.identifier)}`);

  let response: Response;
  try {
    response = await fetch(`${baseUrl}/auth/login`, {
      method: "POST",
      headers: { Authorization: `Basic ${basic}` },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new AuthError(0, describeRequestFailure(error, timeoutMs));
  }

  if (response.status !== 200) {
    throw new AuthError(response.status, response.statusText);
  }

  const token = response.headers.get(SESSION_TOKEN_HEADER);
  if (!token) {
    throw new AuthError(response.status, `Missing ${SESSION_TOKEN_HEADER} header`);
  }

  let body: unknown;
  try {
    body = JSON.parse(await response.text());
  } catch (error) {
    throw new AuthError(
      response.status,
      `Login response is not JSON: ${describeRequestFailure(error, timeoutMs)}`
    );
  }

  const accountId =
    typeof body === "object" && body !== null && "userid" in body
      ? coerceAccountId(body.userid)
      : null;
  if (accountId === null) {
    throw new AuthError(response.status, "Missing userid in login response");
  }

  return { token, accountId };
}

/**
 * Query measurements of one subtype for the logged-in account.
 *
 * @returns The raw response body. It may be a measurement array or an
 * error object; see classifyPayload.
 */
export async function fetchMeasurements(
  session: Session,
  subtype: string,
  range: DateRange = {},
  options?: TidepoolClientOptions
): Promise<Buffer> {
  const { baseUrl, timeoutMs } = resolveOptions(options);
  const url = buildDataUrl(baseUrl, session.accountId, subtype, range);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      headers: {
        [SESSION_TOKEN_HEADER]: session.token,
        "content-type": "application/json",
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new FetchError(0, describeRequestFailure(error, timeoutMs));
  }

  if (response.status !== 200) {
    throw new FetchError(response.status, response.statusText);
  }

  let body: Buffer;
  try {
    body = Buffer.from(await response.arrayBuffer());
  } catch (error) {
    throw new FetchError(response.status, describeRequestFailure(error, timeoutMs));
  }

  console.log(`Tidepool ${subtype} data: ${body.length} bytes`);
  return body;
}
