import { setTimeout as sleep } from 'timers/promises';
import { fetchTransport } from './transport/fetchTransport';
import type {
  HttpClientConfig,
  HttpRequestOptions,
  HttpResponse,
  HttpTransport,
  Logger,
  LoggerMeta,
  QueryParams,
} from './types';

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_BACKOFF_MS = 250;
const DEFAULT_MAX_BACKOFF_MS = 10_000;
const JITTER_RANGE: [number, number] = [0.8, 1.2];

/**
 * Raised by {@link HttpClient.requestJson} for responses outside the 2xx
 * range. {@link HttpClient.requestRaw} never
 * raises it.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly body: string;
  readonly response: HttpResponse;

  constructor(message: string, response: HttpResponse) {
    super(message);
    this.name = 'HttpError';
    this.status = response.status;
    this.body = decodeText(response);
    this.response = response;
  }
}

export function decodeText(response: Pick<HttpResponse, 'body'>): string {
  return new TextDecoder('utf-8').decode(response.body);
}

/** Parses the response body as JSON. Throws a SyntaxError for invalid JSON. */
export function parseJsonBody(response: Pick<HttpResponse, 'body'>): unknown {
  const parsed: unknown = JSON.parse(decodeText(response));
  return parsed;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export class HttpClient {
  private readonly baseUrl?: string;
  private readonly clientName: string;
  private readonly maxRetries: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;

  constructor(config: HttpClientConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.clientName = config.clientName;
    this.maxRetries = Math.max(0, config.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.baseBackoffMs = config.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS;
    this.maxBackoffMs = config.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.transport = config.transport ?? fetchTransport;
    this.logger = config.logger;
  }

  /**
   * Performs the request and resolves with the response whatever its status.
   *
   * Transport failures (DNS, refused connections, resets) are retried up to
   * `maxRetries` times with exponential backoff; the last error is rethrown
   * once attempts run out.
   */
  async requestRaw(opts: HttpRequestOptions): Promise<HttpResponse> {
    const url = this.buildUrl(opts);
    const maxAttempts = this.maxRetries + 1;
    const logMeta: LoggerMeta = {
      client: this.clientName,
      operation: opts.operation,
      url,
    };

    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const start = Date.now();
      this.logger?.debug('http.request.attempt', { ...logMeta, attempt, maxAttempts });
      try {
        const raw = await this.transport({ url });
        this.logger?.debug('http.request.complete', {
          ...logMeta,
          attempt,
          status: raw.status,
          durationMs: Date.now() - start,
        });
        return {
          status: raw.status,
          headers: raw.headers,
          body: raw.body,
          url: raw.url ?? url,
          attempts: attempt,
        };
      } catch (error) {
        lastError = error;
        const failureMeta = {
          ...logMeta,
          attempt,
          maxAttempts,
          error: error instanceof Error ? error.message : String(error),
        };
        if (attempt >= maxAttempts) {
          this.logger?.error('http.request.failed', failureMeta);
          break;
        }
        this.logger?.warn('http.request.retry', failureMeta);
        await sleep(this.computeBackoff(attempt));
      }
    }

    throw lastError;
  }

  async requestJson<T = unknown>(opts: HttpRequestOptions): Promise<T> {
    const response = await this.requestRaw(opts);
    if (!isSuccessStatus(response.status)) {
      throw new HttpError(`HTTP ${response.status}`, response);
    }
    const parsed: T = JSON.parse(decodeText(response));
    return parsed;
  }

  private buildUrl(opts: HttpRequestOptions): string {
    if (opts.url) {
      const url = new URL(opts.url);
      applyQueryParameters(url, opts.query);
      return url.toString();
    }

    const path = opts.path ?? '';
    if (!this.baseUrl) {
      throw new Error('No baseUrl provided and request has no absolute url');
    }
    const normalizedPath = path.startsWith('/') ? path.slice(1) : path;
    const url = new URL(normalizedPath, this.baseUrl);
    applyQueryParameters(url, opts.query);
    return url.toString();
  }

  private computeBackoff(attempt: number): number {
    const exp = Math.min(this.maxBackoffMs, this.baseBackoffMs * 2 ** (attempt - 1));
    const [low, high] = JITTER_RANGE;
    return Math.round(exp * (low + Math.random() * (high - low)));
  }
}

function applyQueryParameters(url: URL, query?: QueryParams): void {
  if (!query) return;
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
}

function normalizeBaseUrl(value?: string): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
}
