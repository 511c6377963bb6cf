import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { toFolderName } from '@shared/propertySchedule';
import type { SmartsheetAPIClient } from '../integrations/SmartsheetAPIClient';
import { XLSX_MIME_TYPE } from '../integrations/SmartsheetAPIClient';
import { isErrnoException } from '../types/common';
import { logAction } from '../utils/actionLog';
import type { AddressLockService } from './AddressLockService';

export type AttachmentUploader = Pick<SmartsheetAPIClient, 'attachFileToRow'>;

export type PublishOutcome = 'attached' | 'skipped' | 'failed';

export interface PublishSummary {
  attached: string[];
  skipped: string[];
  failed: string[];
}

export interface AttachmentPublisherOptions {
  sheetId: number;
  outputDirectory: string;
  locks?: AddressLockService;
}

const WORKBOOK_EXTENSION = '.xlsx';

// Office writes "~$name.xlsx" while a file is open; LibreOffice writes ".~lock.name.xlsx#".
export function isWorkbookCandidate(fileName: string): boolean {
  return (
    fileName.toLowerCase().endsWith(WORKBOOK_EXTENSION) &&
    !fileName.startsWith('~$') &&
    !fileName.startsWith('.~lock')
  );
}

export class AttachmentPublisherService {
  private readonly sheetId: number;
  private readonly outputDirectory: string;
  private readonly locks?: AddressLockService;

  constructor(
    private readonly client: AttachmentUploader,
    options: AttachmentPublisherOptions,
  ) {
    this.sheetId = options.sheetId;
    this.outputDirectory = options.outputDirectory;
    this.locks = options.locks;
  }

  /**
   * Walks every property folder under the output directory and attaches its
   * workbook to the row the lookup names for it. Folders without a workbook
   * or without a row id are skipped; a failed upload does not stop the walk.
   */
  public async publishAll(rowIdsByAddress: Map<string, number>): Promise<PublishSummary> {
    const summary: PublishSummary = { attached: [], skipped: [], failed: [] };

    const rowIdsByFolder = new Map<string, number>();
    for (const [address, rowId] of rowIdsByAddress) {
      rowIdsByFolder.set(toFolderName(address), rowId);
    }

    for (const folder of await this.listPropertyFolders()) {
      const rowId = rowIdsByFolder.get(folder);
      const outcome = rowId === undefined ? 'skipped' : await this.publish(folder, rowId);
      summary[outcome].push(folder);
    }

    return summary;
  }

  public async publish(folder: string, rowId: number): Promise<PublishOutcome> {
    const task = () => this.upload(folder, rowId);
    return this.locks ? this.locks.runExclusive(folder, task) : task();
  }

  public async findWorkbook(folder: string): Promise<string | null> {
    const entries = await readdir(path.join(this.outputDirectory, folder), { withFileTypes: true });
    const candidates = entries
      .filter((entry) => entry.isFile() && isWorkbookCandidate(entry.name))
      .map((entry) => entry.name)
      .sort();
    return candidates.length > 0 ? path.join(this.outputDirectory, folder, candidates[0]) : null;
  }

  private async upload(folder: string, rowId: number): Promise<PublishOutcome> {
    const filePath = await this.findWorkbook(folder);
    if (!filePath) {
      console.warn(`❌ Excel file not found in ${path.join(this.outputDirectory, folder)}`);
      return 'skipped';
    }

    const contents = await readFile(filePath);
    const response = await this.client.attachFileToRow({
      sheetId: this.sheetId,
      rowId,
      fileName: path.basename(filePath),
      contents,
      mimeType: XLSX_MIME_TYPE,
    });

    if (!response.success) {
      console.error(`❌ Smartsheet API Error attaching ${filePath}: ${response.error}`);
      logAction(
        { type: 'attachment.failed', component: 'AttachmentPublisherService', folder, rowId, error: response.error },
        { severity: 'error' },
      );
      return 'failed';
    }

    console.log(`✅ Successfully attached: ${filePath}`);
    logAction({
      type: 'attachment.created',
      component: 'AttachmentPublisherService',
      folder,
      rowId,
      attachmentId: response.data?.id,
    });
    return 'attached';
  }

  private async listPropertyFolders(): Promise<string[]> {
    try {
      const entries = await readdir(this.outputDirectory, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}
