/**
 * Result and error types shared by the bridge components
 */

/**
 * Outcome of an operation that reports failure as a value
 */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Fatal configuration problem (cookie file or environment).
 * The only error the bridge throws; the process cannot continue without it.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * Why a realtime-data request produced no payload
 */
export type FetchFailure =
  | { kind: "connection"; message: string }
  | { kind: "http"; statusCode: number; statusText: string }
  | { kind: "parse"; message: string }
  | { kind: "unexpected"; message: string };

export function describeFetchFailure(failure: FetchFailure): string {
  switch (failure.kind) {
    case "connection":
      return `Connection error: ${failure.message}`;
    case "http":
      return `HTTP ${failure.statusCode}${failure.statusText ? `: ${failure.statusText}` : ""}`;
    case "parse":
      return `Parse error: ${failure.message}`;
    case "unexpected":
      return `Unexpected error: ${failure.message}`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
