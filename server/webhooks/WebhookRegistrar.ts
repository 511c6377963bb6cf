import type { APIResponse } from '../integrations/BaseAPIClient';
import type { SmartsheetAPIClient, SmartsheetWebhook } from '../integrations/SmartsheetAPIClient';
import { logAction } from '../utils/actionLog';

// Smartsheet sheet-scoped webhooks only accept the wildcard, which covers row updates, additions and deletions.
export const DEFAULT_WEBHOOK_EVENTS = ['*.*'];

export type WebhookApi = Pick<SmartsheetAPIClient, 'listWebhooks' | 'createWebhook' | 'updateWebhook'>;

export interface WebhookRegistrarOptions {
  callbackUrl: string;
  sheetId: number;
  name: string;
  events?: string[];
}

/**
 * Makes sure exactly one enabled subscription points at the callback URL.
 * Runs once at startup; failures are logged and returned, never thrown.
 */
export class WebhookRegistrar {
  constructor(
    private readonly api: WebhookApi,
    private readonly options: WebhookRegistrarOptions,
  ) {}

  public async ensureSubscription(): Promise<APIResponse<SmartsheetWebhook>> {
    const { callbackUrl } = this.options;

    const listed = await this.api.listWebhooks();
    if (!listed.success || !listed.data) {
      return this.fail('list', listed);
    }

    const existing = listed.data.find((webhook) => webhook.callbackUrl === callbackUrl);
    if (existing) {
      const enabled = await this.api.updateWebhook(existing.id, { enabled: true });
      if (!enabled.success) {
        return this.fail('enable', enabled);
      }
      console.log(`✅ Webhook ${existing.id} already registered for ${callbackUrl}; enabled`);
      logAction({ type: 'registrar.enabled', component: 'WebhookRegistrar', webhookId: existing.id, callbackUrl });
      return enabled;
    }

    const created = await this.api.createWebhook({
      name: this.options.name,
      callbackUrl,
      scopeObjectId: this.options.sheetId,
      events: this.options.events ?? DEFAULT_WEBHOOK_EVENTS,
    });
    if (!created.success || !created.data) {
      return this.fail('create', created);
    }

    // New webhooks start disabled; enabling them triggers the verification handshake.
    const enabled = await this.api.updateWebhook(created.data.id, { enabled: true });
    if (!enabled.success) {
      return this.fail('enable', enabled);
    }

    console.log(`✅ Webhook ${created.data.id} created for ${callbackUrl}`);
    logAction({ type: 'registrar.created', component: 'WebhookRegistrar', webhookId: created.data.id, callbackUrl });
    return enabled;
  }

  private fail(step: string, response: APIResponse<unknown>): APIResponse<SmartsheetWebhook> {
    const error = response.error ?? 'Empty response from Smartsheet';
    console.error(`❌ Webhook registration failed to ${step}: ${error}`);
    logAction(
      { type: 'registrar.failed', component: 'WebhookRegistrar', step, error, statusCode: response.statusCode },
      { severity: 'error' },
    );
    return { success: false, error, statusCode: response.statusCode };
  }
}
