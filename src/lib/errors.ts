/**
 * Error types
 */

/**
 * Missing or invalid configuration (e.g. no API key in .env)
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public variable: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Non-2xx response (or transport failure) from the market data vendor
 */
export class VendorApiError extends Error {
  constructor(
    message: string,
    public path: string,
    public statusCode?: number
  ) {
    super(message);
    this.name = "VendorApiError";
  }
}

/**
 * A data model invariant did not hold. Indicates a bug upstream, not bad input.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
