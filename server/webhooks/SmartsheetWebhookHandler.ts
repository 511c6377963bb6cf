// SMARTSHEET WEBHOOK HANDLING
// Turns change notifications into workbook generation and row attachments

import { ACTIVATION_COLUMN, getPropertyAddress, toFolderName } from '@shared/propertySchedule';
import type { WebhookProcessingScope } from '../env';
import type { AddressLockService } from '../services/AddressLockService';
import { emptyRowBatch, type ActiveRowService, type RowBatch } from '../services/ActiveRowService';
import type { AttachmentPublisherService, PublishSummary } from '../services/AttachmentPublisherService';
import type { WorkbookFiller } from '../services/PropertyWorkbookService';
import { logAction } from '../utils/actionLog';
import {
  changedColumnSchema,
  webhookEventSchema,
  webhookPayloadSchema,
  type ChangedColumn,
  type WebhookEvent,
  type WebhookReply,
} from './types';

export const NO_RELEVANT_EVENTS_MESSAGE = 'No relevant events found.';
export const NO_ACTIVE_ROWS_MESSAGE = 'No active rows to process.';
export const FILES_ATTACHED_MESSAGE = 'File updated & attached!';

export interface PipelineSummary {
  scope: WebhookProcessingScope;
  fetchSucceeded: boolean;
  activeRows: number;
  generated: string[];
  published: PublishSummary;
}

export interface SmartsheetWebhookHandlerDeps {
  rows: Pick<ActiveRowService, 'fetchActiveRows' | 'fetchRowsById'>;
  workbooks: WorkbookFiller;
  publisher: Pick<AttachmentPublisherService, 'publishAll'>;
  locks: AddressLockService;
  scope: WebhookProcessingScope;
}

/**
 * Reads the events list leniently: entries that do not look like events, and
 * changed columns without a title, are dropped instead of failing the payload.
 */
export function parseWebhookEvents(body: unknown): WebhookEvent[] {
  const payload = webhookPayloadSchema.safeParse(body);
  if (!payload.success) {
    return [];
  }

  const events: WebhookEvent[] = [];
  for (const rawEvent of payload.data.events) {
    const event = webhookEventSchema.safeParse(rawEvent);
    if (!event.success) {
      continue;
    }
    const changedColumns: ChangedColumn[] = [];
    for (const rawColumn of event.data.changedColumns ?? []) {
      const column = changedColumnSchema.safeParse(rawColumn);
      if (column.success) {
        changedColumns.push(column.data);
      }
    }
    events.push({ rowId: event.data.rowId, changedColumns });
  }
  return events;
}

// The transport delivers checkbox values as the text "TRUE"; a boolean is accepted as well.
export function isActivationChange(column: ChangedColumn): boolean {
  if (column.columnTitle !== ACTIVATION_COLUMN) {
    return false;
  }
  const value = column.newValue;
  return value === true || (typeof value === 'string' && value.trim().toUpperCase() === 'TRUE');
}

export function findTriggerEvents(events: WebhookEvent[]): WebhookEvent[] {
  return events.filter((event) => event.changedColumns.some(isActivationChange));
}

export class SmartsheetWebhookHandler {
  constructor(private readonly deps: SmartsheetWebhookHandlerDeps) {}

  public async handleNotification(body: unknown): Promise<WebhookReply> {
    const triggers = findTriggerEvents(parseWebhookEvents(body));
    const rowIds = triggers.flatMap((event) => (event.rowId === undefined ? [] : [event.rowId]));

    const actionable = this.deps.scope === 'event-rows' ? rowIds.length > 0 : triggers.length > 0;
    if (!actionable) {
      return { statusCode: 400, body: { message: NO_RELEVANT_EVENTS_MESSAGE } };
    }

    for (const rowId of rowIds) {
      console.log(`✅ '${ACTIVATION_COLUMN}' checked for row ID: ${rowId}`);
    }

    const summary = await this.runPipeline(rowIds);
    if (summary.activeRows === 0) {
      return { statusCode: 400, body: { message: NO_ACTIVE_ROWS_MESSAGE } };
    }
    return { statusCode: 200, body: { message: FILES_ATTACHED_MESSAGE } };
  }

  /**
   * Fetch, fill, publish. A failed fetch is handled as an empty batch: there
   * is no retry, and the webhook sender only sees that nothing was done.
   */
  public async runPipeline(rowIds: number[]): Promise<PipelineSummary> {
    const { scope } = this.deps;
    const fetched =
      scope === 'event-rows'
        ? await this.deps.rows.fetchRowsById(rowIds)
        : await this.deps.rows.fetchActiveRows();

    let batch: RowBatch;
    if (fetched.success && fetched.data) {
      batch = fetched.data;
    } else {
      console.error(`❌ Row fetch failed, treating as no active rows: ${fetched.error ?? 'unknown error'}`);
      batch = emptyRowBatch();
    }

    const generated: string[] = [];
    for (const record of batch.rows) {
      const address = getPropertyAddress(record.values);
      if (!address) {
        console.warn(`⚠️ Row ${record.rowId} is active but has no property address; skipping`);
        continue;
      }
      const filePath = await this.deps.locks.runExclusive(toFolderName(address), () =>
        this.deps.workbooks.fill(record.values),
      );
      if (filePath) {
        generated.push(filePath);
      }
    }

    // Nothing active means nothing to attach; the output tree is left alone.
    const published: PublishSummary =
      batch.rows.length > 0
        ? await this.deps.publisher.publishAll(batch.rowIdsByAddress)
        : { attached: [], skipped: [], failed: [] };

    const summary: PipelineSummary = {
      scope,
      fetchSucceeded: fetched.success,
      activeRows: batch.rows.length,
      generated,
      published,
    };

    logAction({
      type: 'pipeline.completed',
      component: 'SmartsheetWebhookHandler',
      scope,
      fetchSucceeded: summary.fetchSucceeded,
      activeRows: summary.activeRows,
      generated: generated.length,
      attached: published.attached.length,
      skipped: published.skipped.length,
      failed: published.failed.length,
    });

    return summary;
  }
}
