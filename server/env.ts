import dotenv from 'dotenv';
import { resolve } from 'node:path';

export type WebhookProcessingScope = 'event-rows' | 'active-rows';

export interface AppEnv {
  NODE_ENV: string;
  SMARTSHEET_API_KEY: string;
  SMARTSHEET_SHEET_ID: number;
  SMARTSHEET_API_BASE: string;
  TEMPLATE_PATH: string;
  OUTPUT_DIRECTORY: string;
  PORT: number;
  HOST: string;
  WEBHOOK_CALLBACK_URL: string;
  WEBHOOK_NAME: string;
  WEBHOOK_PROCESSING_SCOPE: WebhookProcessingScope;
}

export const DEFAULT_SMARTSHEET_API_BASE = 'https://api.smartsheet.eu/2.0';
export const DEFAULT_TEMPLATE_PATH = 'Updated Schedule.xlsx';
export const DEFAULT_OUTPUT_DIRECTORY = 'property_folders';

const PROCESSING_SCOPES: readonly WebhookProcessingScope[] = ['event-rows', 'active-rows'];

function isProcessingScope(value: string): value is WebhookProcessingScope {
  return PROCESSING_SCOPES.some((scope) => scope === value);
}

/**
 * Validates raw environment values; every problem found is listed in the thrown error.
 */
export function parseEnv(source: NodeJS.ProcessEnv, cwd: string = process.cwd()): AppEnv {
  const problems: string[] = [];
  const nodeEnv = source.NODE_ENV?.trim() || 'development';

  const apiKey = source.SMARTSHEET_API_KEY?.trim() ?? '';
  if (!apiKey) {
    problems.push('SMARTSHEET_API_KEY is required');
  }

  let sheetId = 0;
  const rawSheetId = source.SMARTSHEET_SHEET_ID?.trim() ?? '';
  if (!rawSheetId) {
    problems.push('SMARTSHEET_SHEET_ID is required');
  } else {
    sheetId = /^\d+$/.test(rawSheetId) ? Number(rawSheetId) : Number.NaN;
    if (!Number.isSafeInteger(sheetId) || sheetId <= 0) {
      problems.push(`SMARTSHEET_SHEET_ID must be a positive integer (received "${rawSheetId}")`);
    }
  }

  const port = Number.parseInt(source.PORT ?? '5000', 10);
  if (Number.isNaN(port) || port <= 0) {
    problems.push(`Invalid PORT value provided: ${source.PORT}`);
  }

  const rawScope = (source.WEBHOOK_PROCESSING_SCOPE ?? 'event-rows').trim().toLowerCase();
  let scope: WebhookProcessingScope = 'event-rows';
  if (isProcessingScope(rawScope)) {
    scope = rawScope;
  } else {
    problems.push(`WEBHOOK_PROCESSING_SCOPE must be one of ${PROCESSING_SCOPES.join(', ')} (received "${rawScope}")`);
  }

  if (problems.length > 0) {
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  return {
    NODE_ENV: nodeEnv,
    SMARTSHEET_API_KEY: apiKey,
    SMARTSHEET_SHEET_ID: sheetId,
    SMARTSHEET_API_BASE: source.SMARTSHEET_API_BASE?.trim() || DEFAULT_SMARTSHEET_API_BASE,
    TEMPLATE_PATH: resolve(cwd, source.TEMPLATE_PATH?.trim() || DEFAULT_TEMPLATE_PATH),
    OUTPUT_DIRECTORY: resolve(cwd, source.OUTPUT_DIRECTORY?.trim() || DEFAULT_OUTPUT_DIRECTORY),
    PORT: port,
    HOST: source.HOST?.trim() || (nodeEnv === 'production' ? '0.0.0.0' : 'localhost'),
    WEBHOOK_CALLBACK_URL: source.WEBHOOK_CALLBACK_URL?.trim() ?? '',
    WEBHOOK_NAME: source.WEBHOOK_NAME?.trim() || 'Property schedule webhook',
    WEBHOOK_PROCESSING_SCOPE: scope,
  };
}

// Load .env and .env.local files (if present), then validate
export function loadEnv(): AppEnv {
  dotenv.config();
  dotenv.config({ path: resolve(process.cwd(), '.env.local') });

  if (!process.env.NODE_ENV) {
    process.env.NODE_ENV = 'development';
  }

  return parseEnv(process.env);
}
