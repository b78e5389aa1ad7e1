/**
 * Types for the homework review API client
 */

/**
 * Configuration for the API client
 */
export interface PracticumApiClientConfig {
  /** OAuth token */
  token: string;

  /** Status endpoint URL */
  endpoint: string;

  /** Abort the request after this many milliseconds */
  requestTimeoutMs: number;
}

/**
 * The subset of fetch the client relies on
 */
export type FetchFn = (
  url: URL,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;
