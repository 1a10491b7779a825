import { HttpClient } from './HttpClient';
import { fetchTransport } from './transport/fetchTransport';
import type { HttpClientConfig, Logger, LoggerMeta } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console logger implementation for use with createDefaultHttpClient.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel) {}

  debug(message: string, meta?: LoggerMeta): void {
    this.log('debug', message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    this.log('info', message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    this.log('warn', message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    this.log('error', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: LoggerMeta): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const fn = console[level];
    meta ? fn(`[${level}] ${message}`, meta) : fn(`[${level}] ${message}`);
  }
}

export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  return new ConsoleLogger(minLevel);
}

/**
 * Creates an HttpClient with defaults suitable for most use cases.
 *
 * Defaults applied:
 * - Transport: fetch-based (via fetchTransport)
 * - Resilience: 3 retries of connection failures, exponential backoff with jitter
 * - Logger: console logger at `info`
 *
 * @example
 * ```typescript
 * const client = createDefaultHttpClient({
 *   clientName: 'my-api',
 *   baseUrl: 'https://api.example.com',
 * });
 *
 * const data = await client.requestJson({ path: '/users/123' });
 * ```
 */
export function createDefaultHttpClient(config: HttpClientConfig): HttpClient {
  return new HttpClient({
    ...config,
    transport: config.transport ?? fetchTransport,
    logger: config.logger ?? createConsoleLogger(),
  });
}
