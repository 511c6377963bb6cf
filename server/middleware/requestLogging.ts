import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import {
  context as otelContext,
  propagation,
  SpanKind,
  SpanStatusCode,
  trace as otelTrace,
} from '@opentelemetry/api';
import { getRequestContext, runWithRequestContext } from '../utils/ExecutionContext';
import { log } from '../utils/log';

const tracer = otelTrace.getTracer('property-schedule.http');

// Correlation ID for every request, reused from x-request-id when the caller sends one
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const existing = req.get('x-request-id');
  const requestId = existing && existing.length > 0 ? existing : randomUUID();
  res.setHeader('x-request-id', requestId);
  runWithRequestContext({ requestId }, () => next());
}

export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const routeSnapshot = req.path;
  const ctx = getRequestContext();
  const parentContext = propagation.extract(otelContext.active(), req.headers);
  const span = tracer.startSpan(
    'http.server.request',
    {
      kind: SpanKind.SERVER,
      attributes: {
        'http.method': req.method,
        'http.target': req.originalUrl,
        'http.user_agent': req.get('user-agent') ?? '',
      },
    },
    parentContext,
  );

  const startTime = process.hrtime.bigint();
  let spanEnded = false;

  const endSpan = (status: { code: SpanStatusCode; message?: string }) => {
    if (spanEnded) {
      return;
    }
    spanEnded = true;
    const trigger = ctx?.trigger;
    span.setAttributes({
      'http.route': routeSnapshot,
      'http.status_code': res.statusCode,
      ...(trigger ? { 'webhook.trigger': trigger } : {}),
    });
    span.setStatus(status);
    span.end();
  };

  res.on('finish', () => {
    endSpan(
      res.statusCode >= 500
        ? { code: SpanStatusCode.ERROR, message: `HTTP ${res.statusCode}` }
        : { code: SpanStatusCode.OK },
    );

    const requestId = ctx?.requestId ?? 'unknown';
    const duration = Number(process.hrtime.bigint() - startTime) / 1_000_000;
    log(`[${requestId}] ${req.method} ${routeSnapshot} ${res.statusCode} in ${Math.round(duration)}ms`);
  });

  res.on('close', () => {
    endSpan({ code: SpanStatusCode.ERROR, message: 'connection closed before response finished' });
  });

  otelContext.with(otelTrace.setSpan(parentContext, span), () => next());
}
