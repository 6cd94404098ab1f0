/**
 * Errors raised at the HTTP edge, before any remote call
 */

export class RequestValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid request: ${issues.join("; ")}`);
    this.name = "RequestValidationError";
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}
