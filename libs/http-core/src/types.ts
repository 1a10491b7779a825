// ============================================================================
// HTTP Core Types
// ============================================================================

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | undefined>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

// ============================================================================
// Transport
// ============================================================================

/** Requests are always GET; only the URL varies. */
export interface TransportRequest {
  url: string;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
  /** Final URL after redirects, when the transport knows it. */
  url?: string;
}

/**
 * A transport performs exactly one attempt. A thrown error is treated as a
 * connection-level failure and may be retried by {@link HttpClient}; any
 * response, whatever its status, is returned to the caller as-is.
 */
export interface HttpTransport {
  (req: TransportRequest): Promise<RawHttpResponse>;
}

// ============================================================================
// Client
// ============================================================================

export interface HttpClientConfig {
  clientName: string;
  baseUrl?: string;
  transport?: HttpTransport;
  /** Extra attempts after a connection failure. Default 3. */
  maxRetries?: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
  logger?: Logger;
}

export interface HttpRequestOptions {
  /** Absolute URL. Takes precedence over `path`. */
  url?: string;
  /** Path resolved against the client's base URL. */
  path?: string;
  query?: QueryParams;
  /** Logical operation name, used in log metadata. */
  operation?: string;
}

export interface HttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
  /** Resolved request URL, including the query string. */
  url: string;
  attempts: number;
}
