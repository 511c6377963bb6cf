import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'node:http';

import { requestContext, requestLogging } from './middleware/requestLogging';
import { createHealthRouter } from './routes/health';
import { createWebhookRouter } from './routes/webhooks';
import { getErrorMessage, HttpError } from './types/common';
import { logAction } from './utils/actionLog';
import type { SmartsheetWebhookHandler } from './webhooks/SmartsheetWebhookHandler';

export const ROOT_MESSAGE = 'Smartsheet Automation is Running!';

export interface RouteDependencies {
  webhookHandler: Pick<SmartsheetWebhookHandler, 'handleNotification'>;
  templatePath: string;
}

function statusOf(error: unknown): number {
  if (error instanceof HttpError) {
    return error.status;
  }
  if (error && typeof error === 'object') {
    if ('status' in error && typeof error.status === 'number') return error.status;
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  }
  return 500;
}

export async function registerRoutes(app: Express, deps: RouteDependencies): Promise<Server> {
  // Parse JSON before the request context is opened so the context survives into the handlers
  app.use(express.json({ limit: '1mb' }));
  app.use(requestContext);
  app.use(requestLogging);

  app.get('/', (_req, res) => {
    res.status(200).type('text/plain').send(ROOT_MESSAGE);
  });

  app.use('/api', createHealthRouter({ templatePath: deps.templatePath }));
  app.use(createWebhookRouter(deps.webhookHandler));

  app.use((req, _res, next) => {
    next(new HttpError(404, `Not found: ${req.method} ${req.path}`));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = getErrorMessage(err) || 'Internal Server Error';

    if (status >= 500) {
      console.error('❌ Request failed:', err);
      logAction({ type: 'request.failed', component: 'routes', status, error: message }, { severity: 'error' });
    }

    res.status(status).json({ message });
  });

  return createServer(app);
}
