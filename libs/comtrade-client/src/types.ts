import type { HttpResponse, HttpTransport, Logger } from '@comtrade/http-core';
import type { Environment } from './config';

/**
 * Comtrade API Client Types
 *
 * Request parameter shapes, client configuration and error classes.
 */

// ============================================================================
// Errors
// ============================================================================

export class ComtradeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ComtradeError';
  }
}

/** The resolved API token cannot be used. Raised while constructing a client. */
export class ComtradeConfigError extends ComtradeError {
  constructor(message: string) {
    super(message);
    this.name = 'ComtradeConfigError';
  }
}

export class ComtradeParameterError extends ComtradeError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly parameter?: string,
  ) {
    super(message);
    this.name = 'ComtradeParameterError';
  }
}

/**
 * The server answered, but not with a usable result: a non-200 status, a
 * malformed or empty envelope, or a missing token field.
 */
export class ComtradeQueryError extends ComtradeError {
  public readonly status: number;

  constructor(
    message: string,
    public readonly response: HttpResponse,
  ) {
    super(message);
    this.name = 'ComtradeQueryError';
    this.status = response.status;
  }
}

export class ReferenceDataPaginationError extends ComtradeError {
  constructor(public readonly tableName: string) {
    super(`Reference table ${tableName} reports more pages; pagination is not supported`);
    this.name = 'ReferenceDataPaginationError';
  }
}

export class UnknownClassificationError extends ComtradeError {
  constructor(
    public readonly code: string,
    allowed: readonly string[],
  ) {
    super(`classification system ${code} not known. Please use one of\n${allowed.join(', ')}`);
    this.name = 'UnknownClassificationError';
  }
}

export class UnknownReferenceTableError extends ComtradeError {
  constructor(public readonly tableName: string) {
    super(`reference table ${tableName} not known`);
    this.name = 'UnknownReferenceTableError';
  }
}

// ============================================================================
// Client Configuration
// ============================================================================

export interface ComtradeClientConfig {
  /** API base URL. Default: http://comtrade.un.org/api/ */
  baseUrl?: string;
  /** Explicit API token. Takes priority over the environment and the token file. */
  token?: string;
  /** Retries of connection-level failures. Default: 3 */
  maxRetries?: number;
  baseRetryDelayMs?: number;
  /** Environment consulted for `COMTRADE_TOKEN`. Nothing is read when omitted. */
  env?: Environment;
  /** Token file consulted after the environment. Nothing is read when omitted. */
  tokenFile?: string;
  logger?: Logger;
  transport?: HttpTransport;
}

// ============================================================================
// Query Parameters
// ============================================================================

/** `C` for commodities (merchandise), `S` for services. */
export type TradeType = 'C' | 'S';

/** `A` for annual, `M` for monthly. */
export type Frequency = 'A' | 'M';

/** `H` for human-readable CSV headings, `M` for machine-readable ones. */
export type HeadingStyle = 'H' | 'M';

export type ParamValue = string | number;

export interface TradeQueryParams {
  /** Reporting area. Default "0". */
  r?: ParamValue;
  /** Classification scheme: HS, H0-H4, ST, S1-S4, BEC or EB02. */
  px?: string;
  /** Time period: YYYY, YYYYMM, `now` or `recent`. */
  ps?: ParamValue;
  /** Partner area. Default "all". */
  p?: ParamValue;
  /** Trade regime / flow, e.g. 1 (imports) or 2 (exports). Default "all". */
  rg?: ParamValue;
  /** Commodity code: a code of the scheme, TOTAL, AG1-AG6 or ALL. Default "AG2". */
  cc?: string;
  /** Maximum records returned. */
  max?: number;
  type?: TradeType;
  freq?: Frequency;
  head?: HeadingStyle;
  token?: string;
  /** IMTS concepts version: `2010` or `orig`. */
  imts?: string;
}

export interface ViewParams {
  r?: ParamValue;
  px?: string;
  ps?: ParamValue;
  type?: TradeType;
  freq?: Frequency;
  token?: string;
}

export interface BulkViewParams extends ViewParams {
  /** Published date from. */
  from?: string;
}

export interface BulkDownloadParams {
  type: TradeType;
  freq: Frequency;
  ps: ParamValue;
  r: ParamValue;
  px: string;
  token?: string;
}

// ============================================================================
// Responses
// ============================================================================

export type DatasetRecord = Record<string, unknown>;

export interface DatasetEnvelope {
  validation: unknown;
  dataset: DatasetRecord[];
}
