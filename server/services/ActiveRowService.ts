import {
  getPropertyAddress,
  isActivated,
  type PropertyRow,
} from '@shared/propertySchedule';
import type { APIResponse } from '../integrations/BaseAPIClient';
import type {
  SmartsheetAPIClient,
  SmartsheetColumn,
  SmartsheetRow,
} from '../integrations/SmartsheetAPIClient';
import { logAction } from '../utils/actionLog';

export interface SheetRowRecord {
  rowId: number;
  values: PropertyRow;
}

export interface RowBatch {
  rows: SheetRowRecord[];
  /** Last retained row wins when two active rows share an address. */
  rowIdsByAddress: Map<string, number>;
}

export type SheetRowSource = Pick<SmartsheetAPIClient, 'getSheet' | 'getRow'>;

export function emptyRowBatch(): RowBatch {
  return { rows: [], rowIdsByAddress: new Map() };
}

export function buildColumnTitles(columns: SmartsheetColumn[]): Map<number, string> {
  return new Map(columns.map((column) => [column.id, column.title]));
}

export function toPropertyRow(row: SmartsheetRow, titles: Map<number, string>): PropertyRow {
  const values: PropertyRow = {};
  for (const cell of row.cells) {
    const title = titles.get(cell.columnId);
    if (!title || cell.value === undefined || cell.value === null || cell.value === '') {
      continue;
    }
    values[title] = cell.value;
  }
  return values;
}

export function buildRowBatch(records: SheetRowRecord[]): RowBatch {
  const batch = emptyRowBatch();
  for (const record of records) {
    if (!isActivated(record.values)) {
      continue;
    }
    batch.rows.push(record);
    const address = getPropertyAddress(record.values);
    if (address) {
      batch.rowIdsByAddress.set(address, record.rowId);
    }
  }
  return batch;
}

/**
 * Reads rows from the configured sheet and keeps the ones whose activation
 * checkbox is ticked. API failures come back as `success: false`; callers
 * decide how to treat them.
 */
export class ActiveRowService {
  constructor(
    private readonly client: SheetRowSource,
    private readonly sheetId: number,
  ) {}

  public async fetchActiveRows(): Promise<APIResponse<RowBatch>> {
    const response = await this.client.getSheet(this.sheetId);
    if (!response.success || !response.data) {
      return this.failure('sheet', response);
    }

    const titles = buildColumnTitles(response.data.columns);
    const batch = buildRowBatch(
      response.data.rows.map((row) => ({ rowId: row.id, values: toPropertyRow(row, titles) })),
    );

    logAction({
      type: 'rows.fetched',
      component: 'ActiveRowService',
      scope: 'sheet',
      totalRows: response.data.rows.length,
      activeRows: batch.rows.length,
    });

    return { success: true, data: batch, statusCode: response.statusCode };
  }

  public async fetchRowsById(rowIds: number[]): Promise<APIResponse<RowBatch>> {
    const records: SheetRowRecord[] = [];

    for (const rowId of new Set(rowIds)) {
      const response = await this.client.getRow(this.sheetId, rowId);
      if (!response.success || !response.data) {
        return this.failure(`row ${rowId}`, response);
      }
      const titles = buildColumnTitles(response.data.columns ?? []);
      records.push({ rowId: response.data.id, values: toPropertyRow(response.data, titles) });
    }

    const batch = buildRowBatch(records);

    logAction({
      type: 'rows.fetched',
      component: 'ActiveRowService',
      scope: 'rows',
      totalRows: records.length,
      activeRows: batch.rows.length,
    });

    return { success: true, data: batch };
  }

  private failure(target: string, response: APIResponse<unknown>): APIResponse<RowBatch> {
    const error = response.error ?? 'Empty response from Smartsheet';
    console.error(`❌ Error fetching ${target} from Smartsheet: ${error}`);
    logAction(
      { type: 'rows.fetch_failed', component: 'ActiveRowService', target, error, statusCode: response.statusCode },
      { severity: 'error' },
    );
    return { success: false, error, statusCode: response.statusCode };
  }
}
