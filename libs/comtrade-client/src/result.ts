import { DataTable } from './dataTable';
import type { DatasetRecord } from './types';

/**
 * Outcome of a successful query: the server's validation block, the rows as
 * a table, and the exact URL that produced them.
 */
export class ComtradeResult {
  readonly validation: unknown;
  readonly dataset: DataTable;
  readonly url: string;

  constructor(validation: unknown, dataset: DataTable | readonly DatasetRecord[], url: string) {
    this.validation = validation;
    this.dataset = dataset instanceof DataTable ? dataset : DataTable.fromRecords(dataset);
    this.url = url;
    Object.freeze(this);
  }
}
