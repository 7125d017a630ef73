import fetch, { FetchError, RequestInit, Response } from "node-fetch";

/**
 * Fetch function the HTTP clients are built on.
 * Tests substitute their own to return canned node-fetch Responses.
 */
export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export const nodeFetch: HttpFetch = (url, init) => fetch(url, init);

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
]);

/**
 * Whether an error thrown by fetch came from the transport (DNS, socket, timeout)
 */
export function isTransportError(error: unknown): boolean {
  if (error instanceof FetchError) {
    return error.type === "system" || error.type === "request-timeout";
  }
  if (error instanceof Error) {
    if (error.name === "AbortError") return true;
    const code = "code" in error ? error.code : undefined;
    return typeof code === "string" && CONNECTION_ERROR_CODES.has(code);
  }
  return false;
}
