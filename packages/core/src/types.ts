/**
 * Core types for the glucose report pipeline
 */

/** The only subtype the report supports: self-monitored blood glucose */
export const SUPPORTED_SUBTYPE = "smbg";

/** Login credentials, supplied per request and never stored */
export interface Credentials {
  /** Account e-mail */
  identifier: string;
  secret: string;
}

/** Opaque session token issued at login */
export type SessionToken = string;

/** Result of a successful login */
export interface Session {
  token: SessionToken;
  /** Service-side account id, always in string form */
  accountId: string;
}

/**
 * Optional date range for a data query.
 * Bounds are calendar dates (YYYY-MM-DD); either may be absent.
 */
export interface DateRange {
  start?: string;
  end?: string;
}

/** A single finger stick reading, ready for display */
export interface NormalizedReading {
  /** YYYY-MM-DD, device-local */
  readonly date: string;
  /** HH:MM:SS, device-local */
  readonly time: string;
  /** Whole mg/dL value as a decimal string */
  readonly value: string;
}

/**
 * Error body returned by the service for some failures
 * (e.g. 403 on bad credentials), sometimes with HTTP 200
 */
export interface ServiceError {
  status: number;
  id: string;
  code: string;
  message: string;
}
