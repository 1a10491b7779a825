import { writeFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  createConsoleLogger,
  createDefaultHttpClient,
  decodeText,
  parseJsonBody,
  type HttpClient,
  type HttpResponse,
  type Logger,
  type QueryParams,
} from '@comtrade/http-core';
import { readFirstArchiveEntry } from './bulk';
import {
  DEFAULT_API_URL,
  DEFAULT_MAX_RETRIES,
  defaultTokenFile,
  parseNumberOrDefault,
} from './config';
import { DataTable } from './dataTable';
import { checkDatasetEnvelope } from './envelope';
import { validateParameters, type ComtradeMethod } from './parameters';
import { ComtradeResult } from './result';
import { resolveToken } from './token';
import type {
  BulkDownloadParams,
  BulkViewParams,
  ComtradeClientConfig,
  TradeQueryParams,
  ViewParams,
} from './types';
import { ComtradeConfigError, ComtradeParameterError, ComtradeQueryError } from './types';

const tokenEnvelopeSchema = z.object({ token: z.string() });

/**
 * UN Comtrade API Client
 *
 * Provides access to the Comtrade API endpoints:
 * - Trade data queries (`get`)
 * - Data availability views (`view`, `viewBulk`)
 * - Bulk archive downloads (`getBulk`)
 * - Token and user-info endpoints
 *
 * The API token is resolved and checked once, at construction. Every query
 * checks its parameter names against the method's allow-list before any
 * request is sent.
 */
export class ComtradeClient {
  readonly baseUrl: string;
  readonly token: string | undefined;
  private readonly tokenFile?: string;
  private readonly logger: Logger;
  private readonly http: HttpClient;

  constructor(config: ComtradeClientConfig = {}) {
    this.baseUrl = config.baseUrl ?? DEFAULT_API_URL;
    this.tokenFile = config.tokenFile;
    this.logger = config.logger ?? createConsoleLogger();
    this.token = resolveToken(
      { token: config.token, env: config.env, tokenFile: config.tokenFile },
      this.logger,
    );
    this.http = createDefaultHttpClient({
      clientName: 'comtrade',
      baseUrl: this.baseUrl,
      transport: config.transport,
      maxRetries: config.maxRetries ?? DEFAULT_MAX_RETRIES,
      baseBackoffMs: config.baseRetryDelayMs,
      logger: this.logger,
    });
  }

  // ==========================================================================
  // Trade Data
  // ==========================================================================

  /**
   * Get trade data.
   *
   * @example
   * ```typescript
   * const result = await client.get({ r: 842, p: 0, ps: 2014, rg: 2, cc: 'TOTAL' });
   * result.dataset.column('TradeValue');
   * ```
   */
  async get(params: TradeQueryParams = {}): Promise<ComtradeResult> {
    validateParameters('get', params);
    const response = await this.makeRequest('get', this.withToken(params), 'get');
    return this.toDatasetResult(response);
  }

  /** Data availability for the given reporter, classification and period. */
  async view(params: ViewParams = {}): Promise<ComtradeResult> {
    validateParameters('view', params);
    const response = await this.makeRequest('refs/da/view', this.withToken(params), 'view');
    return this.toDatasetResult(response);
  }

  /** Availability of bulk archives, optionally restricted to those published since `from`. */
  async viewBulk(params: BulkViewParams = {}): Promise<ComtradeResult> {
    validateParameters('viewBulk', params);
    const response = await this.makeRequest('refs/da/bulk', this.withToken(params), 'viewBulk');
    return this.toDatasetResult(response);
  }

  /**
   * Downloads a bulk archive and reads its first file as CSV.
   *
   * The five positional values go into the URL path; only the token is sent
   * as a query parameter. Bulk archives carry no validation block, so the
   * result's `validation` is an empty object. An entry without data rows is
   * a query error, as for the JSON endpoints.
   */
  async getBulk(params: BulkDownloadParams): Promise<ComtradeResult> {
    validateParameters('getBulk', params);
    const { type, freq, ps, r, px } = params;
    const token = params.token ?? this.token;
    const path = ['get', 'bulk', type, freq, ps, r, px]
      .map((segment) => encodeURIComponent(String(segment)))
      .join('/');

    const response = await this.makeRequest(path, { token }, 'getBulk');

    let entry: ReturnType<typeof readFirstArchiveEntry>;
    try {
      entry = readFirstArchiveEntry(response.body);
    } catch (error) {
      throw new ComtradeQueryError(
        `Bulk download is not a readable ZIP archive: ${error instanceof Error ? error.message : String(error)}`,
        response,
      );
    }
    if (!entry) {
      throw new ComtradeQueryError('Bulk download archive contains no files', response);
    }

    const table = DataTable.fromCsv(entry.text);
    if (table.isEmpty()) {
      throw new ComtradeQueryError('Bulk download archive entry contains no rows', response);
    }

    this.logger.debug('comtrade.bulk.entry', { name: entry.name, url: response.url });
    return new ComtradeResult({}, table, response.url);
  }

  // ==========================================================================
  // Authentication
  // ==========================================================================

  /**
   * Token for requests originating from a registered IP range.
   *
   * @param email - The email address associated with the Comtrade account
   */
  async getSubUserToken(email: string): Promise<string> {
    const params = { email };
    validateParameters('getSubUserToken', params);
    const response = await this.makeRequest('getSubUserToken', params, 'getSubUserToken');
    return this.extractToken(response);
  }

  async getAuthToken(username: string, password: string): Promise<string> {
    const params = { username, password };
    validateParameters('getAuthToken', params);
    const response = await this.makeRequest('getAuthToken', params, 'getAuthToken');
    return this.extractToken(response);
  }

  /**
   * Information about the user and connection behind a token. Falls back to
   * the client's own token.
   */
  async getUserInfo(token?: string): Promise<unknown> {
    const resolved = token ?? this.token;
    if (resolved === undefined) {
      throw new ComtradeParameterError('Cannot get user info without a token', 'getUserInfo', 'token');
    }
    const params = { token: resolved };
    validateParameters('getUserInfo', params);
    const response = await this.makeRequest('getUserInfo', params, 'getUserInfo');
    return this.readJson(response);
  }

  /** Fetches a sub-user token and writes it to the token file. */
  async saveSubUserToken(email: string, tokenFile: string | undefined = this.tokenFile): Promise<string> {
    if (!tokenFile) {
      throw new ComtradeConfigError('No token file configured');
    }
    const token = await this.getSubUserToken(email);
    await writeFile(tokenFile, token, 'utf-8');
    this.logger.info(`Token saved to ${tokenFile}`);
    return token;
  }

  // ==========================================================================
  // Request Helpers
  // ==========================================================================

  private async makeRequest(
    path: string,
    query: QueryParams,
    operation: ComtradeMethod,
  ): Promise<HttpResponse> {
    const response = await this.http.requestRaw({ path, query, operation });
    if (response.status !== 200) {
      throw new ComtradeQueryError(
        `Query failed with status code ${response.status}. Response from server was\n${decodeText(response)}`,
        response,
      );
    }
    return response;
  }

  private withToken(params: object): QueryParams {
    const query = toQueryParams(params);
    return { ...query, token: query.token ?? this.token };
  }

  private readJson(response: HttpResponse): unknown {
    try {
      return parseJsonBody(response);
    } catch (error) {
      throw new ComtradeQueryError(
        `Query indicates success, but the response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        response,
      );
    }
  }

  private toDatasetResult(response: HttpResponse): ComtradeResult {
    const check = checkDatasetEnvelope(this.readJson(response));
    if (!check.ok) {
      throw new ComtradeQueryError(check.reason, response);
    }
    return new ComtradeResult(check.envelope.validation, check.envelope.dataset, response.url);
  }

  private extractToken(response: HttpResponse): string {
    const parsed = tokenEnvelopeSchema.safeParse(this.readJson(response));
    if (!parsed.success) {
      throw new ComtradeQueryError('Query failed to return a valid token', response);
    }
    return parsed.data.token;
  }
}

function toQueryParams(params: object): QueryParams {
  const query: QueryParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      query[key] = value;
    }
  }
  return query;
}

/**
 * Factory function to create a Comtrade client from environment variables
 *
 * Reads `COMTRADE_TOKEN`, `COMTRADE_API_BASE`, `COMTRADE_MAX_RETRIES` and
 * `COMTRADE_TOKEN_FILE` (default `~/.comtraderc`).
 *
 * @param configOverrides - Optional config overrides
 */
export function createComtradeClient(
  configOverrides?: Partial<ComtradeClientConfig>,
): ComtradeClient {
  const env = process.env;
  return new ComtradeClient({
    baseUrl: env.COMTRADE_API_BASE ?? DEFAULT_API_URL,
    maxRetries: parseNumberOrDefault(env.COMTRADE_MAX_RETRIES, DEFAULT_MAX_RETRIES),
    env,
    tokenFile: env.COMTRADE_TOKEN_FILE ?? defaultTokenFile(),
    ...configOverrides,
  });
}
