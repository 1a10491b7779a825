import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import {
  createConsoleLogger,
  createDefaultHttpClient,
  type HttpClient,
  type HttpTransport,
  type Logger,
} from '@comtrade/http-core';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_REFERENCE_BASE_URL,
  defaultDataDir,
  parseNumberOrDefault,
} from './config';
import { DataTable } from './dataTable';
import {
  ReferenceDataPaginationError,
  UnknownClassificationError,
  UnknownReferenceTableError,
} from './types';

export const CLASSIFICATION_CODES = [
  'HS',
  'H0',
  'H1',
  'H2',
  'H3',
  'H4',
  'ST',
  'S1',
  'S2',
  'S3',
  'S4',
  'BEC',
  'EB02',
] as const;

export type ClassificationCode = (typeof CLASSIFICATION_CODES)[number];

export const REFERENCE_TABLES = [
  'reporterAreas',
  'partnerAreas',
  'tradeRegimes',
  ...CLASSIFICATION_CODES.map((code) => `classification${code}` as const),
] as const;

export type ReferenceTableName = (typeof REFERENCE_TABLES)[number];

const referenceEnvelopeSchema = z.object({
  more: z.boolean(),
  results: z.array(z.record(z.string(), z.unknown())),
});

export interface ReferenceDataCacheConfig {
  /** Directory holding one `<name>.csv` per table. */
  dataDir: string;
  /** Default: https://comtrade.un.org/data/cache/ */
  baseUrl?: string;
  maxRetries?: number;
  baseRetryDelayMs?: number;
  logger?: Logger;
  transport?: HttpTransport;
}

export function isClassificationCode(code: string): code is ClassificationCode {
  return CLASSIFICATION_CODES.some((known) => known === code);
}

export function isReferenceTableName(name: string): name is ReferenceTableName {
  return REFERENCE_TABLES.some((known) => known === name);
}

/**
 * Disk-backed store of the Comtrade reference tables.
 *
 * A table is fetched the first time it is asked for and read from disk after
 * that. Nothing expires; `updateTable` and `updateAll` are the only way to
 * refresh a stored copy.
 */
export class ReferenceDataCache {
  readonly dataDir: string;
  private readonly logger: Logger;
  private readonly http: HttpClient;

  constructor(config: ReferenceDataCacheConfig) {
    this.dataDir = config.dataDir;
    this.logger = config.logger ?? createConsoleLogger();
    this.http = createDefaultHttpClient({
      clientName: 'comtrade-reference',
      baseUrl: config.baseUrl ?? DEFAULT_REFERENCE_BASE_URL,
      transport: config.transport,
      maxRetries: config.maxRetries ?? DEFAULT_MAX_RETRIES,
      baseBackoffMs: config.baseRetryDelayMs,
      logger: this.logger,
    });
  }

  tablePath(name: ReferenceTableName): string {
    return path.join(this.dataDir, `${name}.csv`);
  }

  async ensureDataDir(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
  }

  /** Stored copy of the table, fetching and storing it first if there is none. */
  async getTable(name: ReferenceTableName): Promise<DataTable> {
    assertReferenceTable(name);
    const cached = await this.readStored(name);
    return cached ?? this.updateTable(name);
  }

  /**
   * Fetches the table, overwriting any stored copy.
   *
   * The returned table is read back from the CSV just written, so its cells
   * are text (`842`, not 842) exactly as a later `getTable` returns them.
   */
  async updateTable(name: ReferenceTableName): Promise<DataTable> {
    assertReferenceTable(name);
    this.logger.info('Updating reference table', { name });

    const envelope = referenceEnvelopeSchema.parse(
      await this.http.requestJson({ path: `${name}.json`, operation: `reference.${name}` }),
    );
    if (envelope.more) {
      throw new ReferenceDataPaginationError(name);
    }

    const csv = DataTable.fromRecords(envelope.results).toCsv({ index: true });
    const file = this.tablePath(name);
    await this.ensureDataDir();
    await writeFile(file, csv, 'utf-8');
    this.logger.info('Saved reference table', { name, file, rows: envelope.results.length });

    return DataTable.fromCsv(csv, { indexColumn: true });
  }

  /** Re-fetches every reference table, in `REFERENCE_TABLES` order. */
  async updateAll(): Promise<Map<ReferenceTableName, DataTable>> {
    const tables = new Map<ReferenceTableName, DataTable>();
    for (const name of REFERENCE_TABLES) {
      tables.set(name, await this.updateTable(name));
    }
    return tables;
  }

  getPartnerAreas(): Promise<DataTable> {
    return this.getTable('partnerAreas');
  }

  getReporterAreas(): Promise<DataTable> {
    return this.getTable('reporterAreas');
  }

  getTradeRegimes(): Promise<DataTable> {
    return this.getTable('tradeRegimes');
  }

  async getClassification(code: string): Promise<DataTable> {
    if (!isClassificationCode(code)) {
      throw new UnknownClassificationError(code, CLASSIFICATION_CODES);
    }
    return this.getTable(`classification${code}`);
  }

  private async readStored(name: ReferenceTableName): Promise<DataTable | undefined> {
    let text: string;
    try {
      text = await readFile(this.tablePath(name), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
    this.logger.debug('Read stored reference table', { name });
    return DataTable.fromCsv(text, { indexColumn: true });
  }
}

function assertReferenceTable(name: string): asserts name is ReferenceTableName {
  if (!isReferenceTableName(name)) {
    throw new UnknownReferenceTableError(name);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Factory function to create a reference-data cache from environment variables
 *
 * Reads `COMTRADE_DATA_DIR` (default `~/.comtrade/data`),
 * `COMTRADE_REFERENCE_BASE` and `COMTRADE_MAX_RETRIES`.
 */
export function createReferenceDataCache(
  configOverrides?: Partial<ReferenceDataCacheConfig>,
): ReferenceDataCache {
  const env = process.env;
  return new ReferenceDataCache({
    dataDir: env.COMTRADE_DATA_DIR ?? defaultDataDir(),
    baseUrl: env.COMTRADE_REFERENCE_BASE ?? DEFAULT_REFERENCE_BASE_URL,
    maxRetries: parseNumberOrDefault(env.COMTRADE_MAX_RETRIES, DEFAULT_MAX_RETRIES),
    ...configOverrides,
  });
}
