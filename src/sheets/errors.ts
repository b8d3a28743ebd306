/**
 * Error types raised around the Sheets API. The analyzers never throw; these
 * surface from auth and fetch only.
 */

/** Credentials are missing or unusable, or the user did not authorize. */
export class SheetsAuthError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SheetsAuthError';
  }
}

/** A Sheets API call failed (transport, permissions, unknown sheet). */
export class SheetsRequestError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SheetsRequestError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
