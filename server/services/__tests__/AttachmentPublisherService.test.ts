import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { APIResponse } from '../../integrations/BaseAPIClient';
import { XLSX_MIME_TYPE, type AttachFileParams, type SmartsheetAttachment } from '../../integrations/SmartsheetAPIClient';
import { AddressLockService } from '../AddressLockService';
import { AttachmentPublisherService, isWorkbookCandidate, type AttachmentUploader } from '../AttachmentPublisherService';

class FakeUploader implements AttachmentUploader {
  public readonly uploads: AttachFileParams[] = [];

  constructor(private readonly failingRows: Set<number> = new Set()) {}

  async attachFileToRow(params: AttachFileParams): Promise<APIResponse<SmartsheetAttachment>> {
    this.uploads.push(params);
    if (this.failingRows.has(params.rowId)) {
      return { success: false, error: 'HTTP 500: Internal Server Error', statusCode: 500 };
    }
    return { success: true, data: { id: params.rowId * 10, name: params.fileName }, statusCode: 200 };
  }
}

describe('isWorkbookCandidate', () => {
  it('accepts workbooks and ignores editor lock files', () => {
    expect(isWorkbookCandidate('12 Elm St.xlsx')).toBe(true);
    expect(isWorkbookCandidate('REPORT.XLSX')).toBe(true);
    expect(isWorkbookCandidate('~$12 Elm St.xlsx')).toBe(false);
    expect(isWorkbookCandidate('.~lock.12 Elm St.xlsx')).toBe(false);
    expect(isWorkbookCandidate('notes.txt')).toBe(false);
  });
});

describe('AttachmentPublisherService', () => {
  let outputDirectory: string;

  async function addFile(folder: string, name: string, contents = 'bytes'): Promise<void> {
    await mkdir(path.join(outputDirectory, folder), { recursive: true });
    await writeFile(path.join(outputDirectory, folder, name), contents);
  }

  beforeEach(async () => {
    outputDirectory = await mkdtemp(path.join(os.tmpdir(), 'property-folders-'));
  });

  afterEach(async () => {
    await rm(outputDirectory, { recursive: true, force: true });
  });

  it('attaches each folder workbook to the row named for it', async () => {
    await addFile('12 Elm St', '12 Elm St.xlsx', 'elm');
    const uploader = new FakeUploader();
    const publisher = new AttachmentPublisherService(uploader, { sheetId: 42, outputDirectory });

    const summary = await publisher.publishAll(new Map([['12 Elm St', 7]]));

    expect(summary).toEqual({ attached: ['12 Elm St'], skipped: [], failed: [] });
    expect(uploader.uploads).toHaveLength(1);
    expect(uploader.uploads[0]).toMatchObject({
      sheetId: 42,
      rowId: 7,
      fileName: '12 Elm St.xlsx',
      mimeType: XLSX_MIME_TYPE,
    });
    expect(uploader.uploads[0].contents.toString()).toBe('elm');
  });

  it('skips folders with no active row and folders with no workbook', async () => {
    await addFile('12 Elm St', '12 Elm St.xlsx');
    await addFile('3 Oak Rd', 'notes.txt');
    await addFile('Old Farm', 'Old Farm.xlsx');
    const uploader = new FakeUploader();
    const publisher = new AttachmentPublisherService(uploader, { sheetId: 42, outputDirectory });

    const summary = await publisher.publishAll(
      new Map([
        ['12 Elm St', 7],
        ['3 Oak Rd', 8],
      ]),
    );

    expect(summary).toEqual({ attached: ['12 Elm St'], skipped: ['3 Oak Rd', 'Old Farm'], failed: [] });
    expect(uploader.uploads.map((upload) => upload.rowId)).toEqual([7]);
  });

  it('picks the first workbook by name and ignores lock files', async () => {
    await addFile('12 Elm St', '~$12 Elm St.xlsx');
    await addFile('12 Elm St', 'b.xlsx');
    await addFile('12 Elm St', 'a.xlsx');
    const publisher = new AttachmentPublisherService(new FakeUploader(), { sheetId: 42, outputDirectory });

    await expect(publisher.findWorkbook('12 Elm St')).resolves.toBe(path.join(outputDirectory, '12 Elm St', 'a.xlsx'));
  });

  it('continues past a failed upload', async () => {
    await addFile('12 Elm St', '12 Elm St.xlsx');
    await addFile('3 Oak Rd', '3 Oak Rd.xlsx');
    const uploader = new FakeUploader(new Set([7]));
    const publisher = new AttachmentPublisherService(uploader, { sheetId: 42, outputDirectory });

    const summary = await publisher.publishAll(
      new Map([
        ['12 Elm St', 7],
        ['3 Oak Rd', 8],
      ]),
    );

    expect(summary).toEqual({ attached: ['3 Oak Rd'], skipped: [], failed: ['12 Elm St'] });
  });

  it('matches sanitized folder names back to their addresses', async () => {
    await addFile('Flat 2-14 High St', 'Flat 2-14 High St.xlsx');
    const uploader = new FakeUploader();
    const publisher = new AttachmentPublisherService(uploader, { sheetId: 42, outputDirectory });

    const summary = await publisher.publishAll(new Map([['Flat 2/14 High St', 9]]));

    expect(summary.attached).toEqual(['Flat 2-14 High St']);
    expect(uploader.uploads[0].rowId).toBe(9);
  });

  it('returns an empty summary when the output directory does not exist', async () => {
    const uploader = new FakeUploader();
    const publisher = new AttachmentPublisherService(uploader, {
      sheetId: 42,
      outputDirectory: path.join(outputDirectory, 'missing'),
    });

    await expect(publisher.publishAll(new Map([['12 Elm St', 7]]))).resolves.toEqual({
      attached: [],
      skipped: [],
      failed: [],
    });
    expect(uploader.uploads).toEqual([]);
  });

  it('uploads under the address lock when one is supplied', async () => {
    await addFile('12 Elm St', '12 Elm St.xlsx');
    const locks = new AddressLockService();
    const order: string[] = [];
    const uploader: AttachmentUploader = {
      async attachFileToRow(params) {
        order.push('upload');
        return { success: true, data: { id: 1, name: params.fileName } };
      },
    };
    const publisher = new AttachmentPublisherService(uploader, { sheetId: 42, outputDirectory, locks });

    const held = locks.runExclusive('12 Elm St', async () => {
      order.push('fill');
    });
    const published = publisher.publish('12 Elm St', 7);

    await Promise.all([held, published]);
    expect(order).toEqual(['fill', 'upload']);
  });
});
