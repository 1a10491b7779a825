/**
 * @comtrade/client
 *
 * UN Comtrade API Client Library
 *
 * Provides typed access to the Comtrade API:
 * - Trade data queries and data availability views
 * - Bulk archive downloads
 * - Token and user-info endpoints
 * - A disk cache of reference tables (areas, trade regimes, classifications)
 *
 * ## Usage
 *
 * ```typescript
 * import { createComtradeClient, createReferenceDataCache } from '@comtrade/client';
 *
 * // Create client (reads COMTRADE_TOKEN or ~/.comtraderc)
 * const client = createComtradeClient();
 *
 * // US exports to the world, 2014, all commodities
 * const result = await client.get({ r: 842, p: 0, ps: 2014, rg: 2, cc: 'TOTAL' });
 * console.log(result.url, result.dataset.rowCount);
 *
 * // Bulk archive
 * const bulk = await client.getBulk({ type: 'C', freq: 'A', ps: 2014, r: 842, px: 'HS' });
 *
 * // Reference tables, fetched once and kept under ~/.comtrade/data
 * const reference = createReferenceDataCache();
 * const reporters = await reference.getReporterAreas();
 * const hs = await reference.getClassification('HS');
 * ```
 *
 * ## Environment Variables
 *
 * - `COMTRADE_TOKEN` - API token (152 characters)
 * - `COMTRADE_TOKEN_FILE` - Token file (default: ~/.comtraderc)
 * - `COMTRADE_API_BASE` - Base URL (default: http://comtrade.un.org/api/)
 * - `COMTRADE_MAX_RETRIES` - Connection retries (default: 3)
 * - `COMTRADE_DATA_DIR` - Reference table directory (default: ~/.comtrade/data)
 * - `COMTRADE_REFERENCE_BASE` - Reference table source (default: https://comtrade.un.org/data/cache/)
 */

// ============================================================================
// Primary API - Clients and Factories
// ============================================================================

export { ComtradeClient, createComtradeClient } from './comtradeClient';
export {
  ReferenceDataCache,
  createReferenceDataCache,
  CLASSIFICATION_CODES,
  REFERENCE_TABLES,
  isClassificationCode,
  isReferenceTableName,
} from './referenceData';
export type { ClassificationCode, ReferenceTableName, ReferenceDataCacheConfig } from './referenceData';

// ============================================================================
// Results and Tables
// ============================================================================

export { ComtradeResult } from './result';
export { DataTable } from './dataTable';
export type { CellValue, TableRow, CsvReadOptions, CsvWriteOptions } from './dataTable';

// ============================================================================
// Validation
// ============================================================================

export { ALLOWED_PARAMETERS, validateParameters } from './parameters';
export type { ComtradeMethod } from './parameters';
export { checkDatasetEnvelope, DATASET_ENVELOPE_RULES } from './envelope';
export type { EnvelopeCheck } from './envelope';
export { resolveToken, findToken } from './token';
export type { TokenSource, TokenSources, ResolvedToken } from './token';

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_API_URL,
  DEFAULT_REFERENCE_BASE_URL,
  DEFAULT_MAX_RETRIES,
  TOKEN_ENV_NAME,
  TOKEN_LENGTH,
  defaultDataDir,
  defaultTokenFile,
} from './config';
export type { Environment } from './config';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  ComtradeClientConfig,
  TradeType,
  Frequency,
  HeadingStyle,
  ParamValue,
  TradeQueryParams,
  ViewParams,
  BulkViewParams,
  BulkDownloadParams,
  DatasetRecord,
  DatasetEnvelope,
} from './types';

// ============================================================================
// Error Exports
// ============================================================================

export {
  ComtradeError,
  ComtradeConfigError,
  ComtradeParameterError,
  ComtradeQueryError,
  ReferenceDataPaginationError,
  UnknownClassificationError,
  UnknownReferenceTableError,
} from './types';
