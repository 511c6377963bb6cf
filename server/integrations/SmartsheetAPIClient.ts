import type { Schema } from 'ajv';
import { APICredentials, APIResponse, BaseAPIClient } from './BaseAPIClient';

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export type SmartsheetCellValue = string | number | boolean;

export interface SmartsheetColumn {
  id: number;
  title: string;
  type?: string;
}

export interface SmartsheetCell {
  columnId: number;
  value?: SmartsheetCellValue | null;
  displayValue?: string;
}

export interface SmartsheetRow {
  id: number;
  rowNumber?: number;
  cells: SmartsheetCell[];
  columns?: SmartsheetColumn[];
}

export interface SmartsheetSheet {
  id: number;
  name?: string;
  columns: SmartsheetColumn[];
  rows: SmartsheetRow[];
}

export interface SmartsheetAttachment {
  id: number;
  name: string;
  mimeType?: string;
}

export interface SmartsheetWebhook {
  id: number;
  name?: string;
  callbackUrl: string;
  scope?: string;
  scopeObjectId?: number;
  events?: string[];
  enabled: boolean;
  status?: string;
}

export interface CreateWebhookParams {
  name: string;
  callbackUrl: string;
  scopeObjectId: number;
  events: string[];
}

export interface AttachFileParams {
  sheetId: number;
  rowId: number;
  fileName: string;
  contents: Buffer;
  mimeType?: string;
}

const COLUMN_SCHEMA = {
  type: 'object',
  required: ['id', 'title'],
  properties: {
    id: { type: 'number' },
    title: { type: 'string' },
  },
} as const;

const ROW_SCHEMA = {
  type: 'object',
  required: ['id', 'cells'],
  properties: {
    id: { type: 'number' },
    cells: {
      type: 'array',
      items: {
        type: 'object',
        required: ['columnId'],
        properties: {
          columnId: { type: 'number' },
          value: { type: ['string', 'number', 'boolean', 'null'] },
        },
      },
    },
    columns: { type: 'array', items: COLUMN_SCHEMA },
  },
} as const;

const SHEET_SCHEMA: Schema = {
  type: 'object',
  required: ['id', 'columns', 'rows'],
  properties: {
    id: { type: 'number' },
    columns: { type: 'array', items: COLUMN_SCHEMA },
    rows: { type: 'array', items: ROW_SCHEMA },
  },
};

const SINGLE_ROW_SCHEMA: Schema = ROW_SCHEMA;

const WEBHOOK_SCHEMA = {
  type: 'object',
  required: ['id', 'callbackUrl', 'enabled'],
  properties: {
    id: { type: 'number' },
    callbackUrl: { type: 'string' },
    enabled: { type: 'boolean' },
  },
} as const;

const WEBHOOK_LIST_SCHEMA: Schema = {
  type: 'object',
  required: ['data'],
  properties: {
    data: { type: 'array', items: WEBHOOK_SCHEMA },
  },
};

function resultSchema(result: Schema): Schema {
  return {
    type: 'object',
    required: ['result'],
    properties: { result },
  };
}

const WEBHOOK_RESULT_SCHEMA = resultSchema(WEBHOOK_SCHEMA);

const ATTACHMENT_RESULT_SCHEMA = resultSchema({
  type: 'object',
  required: ['id', 'name'],
  properties: {
    id: { type: 'number' },
    name: { type: 'string' },
  },
});

function unwrapResult<T>(response: APIResponse<{ result: T }>): APIResponse<T> {
  const { data, ...rest } = response;
  return data ? { ...rest, data: data.result } : rest;
}

/**
 * Header values must stay within Latin-1, so names outside printable ASCII get
 * an ASCII `filename` fallback plus an RFC 5987 `filename*` with the UTF-8 name.
 */
export function buildContentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  if (fallback === fileName) {
    return `attachment; filename="${fileName}"`;
  }
  const encoded = encodeURIComponent(fileName).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

export class SmartsheetAPIClient extends BaseAPIClient {
  constructor(credentials: APICredentials, baseURL = 'https://api.smartsheet.com/2.0') {
    const token = credentials.accessToken || credentials.apiKey;
    if (!token) {
      throw new Error('Smartsheet integration requires accessToken or apiKey');
    }
    super(baseURL, credentials);
  }

  protected getAuthHeaders(): Record<string, string> {
    const token = this.credentials.accessToken || this.credentials.apiKey || '';
    return {
      Authorization: `Bearer ${token}`,
    };
  }

  public async testConnection(): Promise<APIResponse<unknown>> {
    return this.get('/users/me');
  }

  public async getSheet(sheetId: number): Promise<APIResponse<SmartsheetSheet>> {
    return this.withSchema<SmartsheetSheet>(SHEET_SCHEMA, await this.get(`/sheets/${sheetId}`));
  }

  /**
   * Fetches one row with its column definitions so cells can be resolved by title.
   */
  public async getRow(sheetId: number, rowId: number): Promise<APIResponse<SmartsheetRow>> {
    const query = this.buildQueryString({ include: 'columns' });
    return this.withSchema<SmartsheetRow>(
      SINGLE_ROW_SCHEMA,
      await this.get(`/sheets/${sheetId}/rows/${rowId}${query}`)
    );
  }

  public async attachFileToRow(params: AttachFileParams): Promise<APIResponse<SmartsheetAttachment>> {
    this.validateRequiredParams(params, ['sheetId', 'rowId', 'fileName', 'contents']);
    const response = await this.makeBinaryRequest(
      'POST',
      `/sheets/${params.sheetId}/rows/${params.rowId}/attachments`,
      params.contents,
      {
        'Content-Type': params.mimeType ?? XLSX_MIME_TYPE,
        'Content-Disposition': buildContentDisposition(params.fileName),
      }
    );
    return unwrapResult(this.withSchema<{ result: SmartsheetAttachment }>(ATTACHMENT_RESULT_SCHEMA, response));
  }

  public async listWebhooks(): Promise<APIResponse<SmartsheetWebhook[]>> {
    const query = this.buildQueryString({ includeAll: true });
    const response = this.withSchema<{ data: SmartsheetWebhook[] }>(
      WEBHOOK_LIST_SCHEMA,
      await this.get(`/webhooks${query}`)
    );
    const { data, ...rest } = response;
    return data ? { ...rest, data: data.data } : rest;
  }

  public async createWebhook(params: CreateWebhookParams): Promise<APIResponse<SmartsheetWebhook>> {
    this.validateRequiredParams(params, ['name', 'callbackUrl', 'scopeObjectId']);
    const response = await this.post('/webhooks', {
      name: params.name,
      callbackUrl: params.callbackUrl,
      scope: 'sheet',
      scopeObjectId: params.scopeObjectId,
      events: params.events,
      version: 1,
    });
    return unwrapResult(this.withSchema<{ result: SmartsheetWebhook }>(WEBHOOK_RESULT_SCHEMA, response));
  }

  public async updateWebhook(
    webhookId: number,
    changes: { enabled?: boolean; callbackUrl?: string }
  ): Promise<APIResponse<SmartsheetWebhook>> {
    const response = await this.put(`/webhooks/${webhookId}`, changes);
    return unwrapResult(this.withSchema<{ result: SmartsheetWebhook }>(WEBHOOK_RESULT_SCHEMA, response));
  }
}
