import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

export type CellValue = string | number | boolean | null;

export type TableRow = Readonly<Record<string, CellValue>>;

export interface CsvReadOptions {
  /** Treat the first column as row index labels rather than data. */
  indexColumn?: boolean;
}

export interface CsvWriteOptions {
  /** Write the row index as a leading, unnamed column. */
  index?: boolean;
}

const csvGridSchema = z.array(z.array(z.string()));

/**
 * Column-oriented view over row-aligned cells.
 *
 * Every row has exactly one cell per column; absent values are `null`.
 */
export class DataTable {
  private constructor(
    readonly columns: readonly string[],
    readonly index: readonly string[],
    private readonly cells: readonly (readonly CellValue[])[],
  ) {}

  /**
   * Builds a table from row records. Columns are the union of the records'
   * keys in first-seen order.
   */
  static fromRecords(records: readonly Record<string, unknown>[]): DataTable {
    const columns: string[] = [];
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key)) {
          seen.add(key);
          columns.push(key);
        }
      }
    }

    const cells = records.map((record) =>
      columns.map((column) => (Object.hasOwn(record, column) ? toCell(record[column]) : null)),
    );
    return new DataTable(columns, defaultIndex(records.length), cells);
  }

  static fromCsv(text: string, options: CsvReadOptions = {}): DataTable {
    const grid = csvGridSchema.parse(
      parse(text, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    );
    const [header, ...rows] = grid;
    if (!header) {
      return new DataTable([], [], []);
    }

    const offset = options.indexColumn ? 1 : 0;
    const columns = header.slice(offset);
    const index = options.indexColumn
      ? rows.map((row) => row[0] ?? '')
      : defaultIndex(rows.length);
    const cells = rows.map((row) =>
      columns.map((_, i) => {
        const value = row[i + offset];
        return value === undefined || value === '' ? null : value;
      }),
    );
    return new DataTable(columns, index, cells);
  }

  get rowCount(): number {
    return this.cells.length;
  }

  isEmpty(): boolean {
    return this.cells.length === 0;
  }

  column(name: string): CellValue[] {
    const position = this.columns.indexOf(name);
    if (position === -1) {
      throw new Error(`Unknown column: ${name}`);
    }
    return this.cells.map((row) => row[position] ?? null);
  }

  row(position: number): TableRow {
    const cells = this.cells[position];
    if (!cells) {
      throw new RangeError(`Row ${position} out of range (0..${this.cells.length - 1})`);
    }
    const row: Record<string, CellValue> = {};
    this.columns.forEach((column, i) => {
      row[column] = cells[i] ?? null;
    });
    return row;
  }

  toRecords(): TableRow[] {
    return this.cells.map((_, i) => this.row(i));
  }

  toCsv(options: CsvWriteOptions = {}): string {
    const header = options.index ? ['', ...this.columns] : [...this.columns];
    const rows = this.cells.map((row, i) => {
      const values = row.map(formatCell);
      return options.index ? [this.index[i] ?? String(i), ...values] : values;
    });
    return stringify([header, ...rows]);
  }
}

function defaultIndex(length: number): string[] {
  return Array.from({ length }, (_, i) => String(i));
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return JSON.stringify(value);
}

function formatCell(value: CellValue): string {
  return value === null ? '' : String(value);
}
