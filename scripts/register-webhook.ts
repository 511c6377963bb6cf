#!/usr/bin/env tsx
import { loadEnv } from '../server/env';
import { SmartsheetAPIClient } from '../server/integrations/SmartsheetAPIClient';
import { WebhookRegistrar } from '../server/webhooks/WebhookRegistrar';

async function main() {
  const env = loadEnv();
  if (!env.WEBHOOK_CALLBACK_URL) {
    throw new Error('WEBHOOK_CALLBACK_URL must be set to register a webhook');
  }

  const client = new SmartsheetAPIClient({ apiKey: env.SMARTSHEET_API_KEY }, env.SMARTSHEET_API_BASE);
  const connection = await client.testConnection();
  if (!connection.success) {
    throw new Error(`Smartsheet credentials rejected: ${connection.error}`);
  }
  const registrar = new WebhookRegistrar(client, {
    callbackUrl: env.WEBHOOK_CALLBACK_URL,
    sheetId: env.SMARTSHEET_SHEET_ID,
    name: env.WEBHOOK_NAME,
  });

  const result = await registrar.ensureSubscription();
  if (!result.success || !result.data) {
    throw new Error(result.error || 'webhook registration failed');
  }
  console.log(`Webhook ${result.data.id} enabled=${result.data.enabled} status=${result.data.status ?? 'unknown'}`);
}

main().catch((error) => {
  console.error('❌ Webhook registration failed:', error);
  process.exit(1);
});
