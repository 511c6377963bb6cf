import { loadEnv, type AppEnv } from './env';

import express from 'express';
import { SmartsheetAPIClient } from './integrations/SmartsheetAPIClient';
import { registerRoutes } from './routes';
import { getErrorMessage } from './types/common';
import { ActiveRowService } from './services/ActiveRowService';
import { AddressLockService } from './services/AddressLockService';
import { AttachmentPublisherService } from './services/AttachmentPublisherService';
import { PropertyWorkbookService } from './services/PropertyWorkbookService';
import { log } from './utils/log';
import { SmartsheetWebhookHandler } from './webhooks/SmartsheetWebhookHandler';
import { WebhookRegistrar } from './webhooks/WebhookRegistrar';

function loadEnvOrExit(): AppEnv {
  try {
    return loadEnv();
  } catch (error) {
    console.error(`❌ ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

const env = loadEnvOrExit();

const client = new SmartsheetAPIClient({ apiKey: env.SMARTSHEET_API_KEY }, env.SMARTSHEET_API_BASE);
const locks = new AddressLockService();

const webhookHandler = new SmartsheetWebhookHandler({
  rows: new ActiveRowService(client, env.SMARTSHEET_SHEET_ID),
  workbooks: new PropertyWorkbookService({
    templatePath: env.TEMPLATE_PATH,
    outputDirectory: env.OUTPUT_DIRECTORY,
  }),
  publisher: new AttachmentPublisherService(client, {
    sheetId: env.SMARTSHEET_SHEET_ID,
    outputDirectory: env.OUTPUT_DIRECTORY,
    locks,
  }),
  locks,
  scope: env.WEBHOOK_PROCESSING_SCOPE,
});

const app = express();
const server = await registerRoutes(app, { webhookHandler, templatePath: env.TEMPLATE_PATH });

server.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    console.error(`❌ Port ${env.PORT} is already in use. Set PORT to a free port.`);
  } else {
    console.error('❌ Failed to start HTTP server:', error);
  }
  process.exit(1);
});

server.listen({ port: env.PORT, host: env.HOST }, () => {
  log(`serving on ${env.HOST}:${env.PORT}`);
  log(`processing scope: ${env.WEBHOOK_PROCESSING_SCOPE}; output: ${env.OUTPUT_DIRECTORY}`);
});

if (env.WEBHOOK_CALLBACK_URL) {
  const registrar = new WebhookRegistrar(client, {
    callbackUrl: env.WEBHOOK_CALLBACK_URL,
    sheetId: env.SMARTSHEET_SHEET_ID,
    name: env.WEBHOOK_NAME,
  });
  // Registration failures are logged inside the registrar; serving continues either way.
  const registration = await registrar.ensureSubscription();
  if (!registration.success) {
    console.warn('⚠️ Webhook not registered; events will not arrive until a subscription is enabled.');
  }
} else {
  log('WEBHOOK_CALLBACK_URL not set; skipping webhook registration', 'registrar');
}
