import { logs, SeverityNumber } from '@opentelemetry/api-logs';
import { getRequestContext } from './ExecutionContext';

const DEFAULT_SCOPE = 'property-schedule.action-log';
const DEFAULT_VERSION = '1.0.0';
const RESERVED_KEYS = new Set(['type', 'message', 'severity', 'component', 'attributes']);

export type SeverityLevel = 'debug' | 'info' | 'warn' | 'error';

type AttributeValue = string | number | boolean;

export type ActionEvent = {
  type: string;
  message?: string;
  severity?: SeverityLevel;
  component?: string;
  attributes?: Record<string, unknown>;
  [key: string]: unknown;
};

export type LogActionOptions = {
  severity?: SeverityLevel;
  component?: string;
};

const severityMap: Record<SeverityLevel, { number: SeverityNumber; text: string }> = {
  debug: { number: SeverityNumber.DEBUG, text: 'DEBUG' },
  info: { number: SeverityNumber.INFO, text: 'INFO' },
  warn: { number: SeverityNumber.WARN, text: 'WARN' },
  error: { number: SeverityNumber.ERROR, text: 'ERROR' },
};

let logger: ReturnType<typeof logs.getLogger> | null = null;

function getLogger(): ReturnType<typeof logs.getLogger> {
  if (!logger) {
    logger = logs.getLogger(DEFAULT_SCOPE, DEFAULT_VERSION);
  }
  return logger;
}

function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function toAttributeKey(key: string): string {
  const sanitized = key.trim().replace(/[^a-zA-Z0-9_.:-]/g, '_') || 'unknown';
  return sanitized.startsWith('event.') ? sanitized : `event.${sanitized}`;
}

function collectAttributes(event: ActionEvent, options: LogActionOptions = {}): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = { 'event.type': event.type };

  const component = options.component ?? event.component;
  if (component) {
    attributes['event.component'] = component;
  }

  const requestId = getRequestContext()?.requestId;
  if (requestId) {
    attributes['event.request_id'] = requestId;
  }

  const apply = (entries: Record<string, unknown>) => {
    for (const [key, raw] of Object.entries(entries)) {
      const value = toAttributeValue(raw);
      if (value !== undefined) {
        attributes[toAttributeKey(key)] = value;
      }
    }
  };

  if (event.attributes) {
    apply(event.attributes);
  }
  apply(Object.fromEntries(Object.entries(event).filter(([key]) => !RESERVED_KEYS.has(key))));

  return attributes;
}

/**
 * Emits a structured event through the OpenTelemetry logs API. Without a
 * registered LoggerProvider the emit is a no-op, so call sites keep their
 * console diagnostics alongside.
 */
export function logAction(event: ActionEvent, options: LogActionOptions = {}): void {
  if (!event.type.trim()) {
    console.warn('⚠️ logAction called without a valid event.type');
    return;
  }

  const severity = severityMap[options.severity ?? event.severity ?? 'info'];
  const attributes = collectAttributes(event, options);

  try {
    getLogger().emit({
      severityNumber: severity.number,
      severityText: severity.text,
      body: event.message ?? `Action recorded: ${event.type}`,
      attributes,
      timestamp: Date.now(),
    });
  } catch (error) {
    console.error(
      `⚠️ Failed to emit OTEL action log for ${event.type}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
