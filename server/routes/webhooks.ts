import { Router, type NextFunction, type Request, type Response } from 'express';

import { setRequestTrigger } from '../utils/ExecutionContext';
import { logAction } from '../utils/actionLog';
import type { SmartsheetWebhookHandler } from '../webhooks/SmartsheetWebhookHandler';
import { challengeBodySchema } from '../webhooks/types';

export const CHALLENGE_QUERY_PARAM = 'smartsheetHookChallenge';
export const CHALLENGE_HEADER = 'Smartsheet-Hook-Challenge';
export const CHALLENGE_RESPONSE_HEADER = 'Smartsheet-Hook-Response';

function readChallenge(req: Request): string | null {
  const parsed = challengeBodySchema.safeParse(req.body);
  if (parsed.success) {
    return parsed.data.challenge;
  }
  const header = req.get(CHALLENGE_HEADER);
  return header && header.length > 0 ? header : null;
}

export function createWebhookRouter(handler: Pick<SmartsheetWebhookHandler, 'handleNotification'>): Router {
  const router = Router();

  router.get('/webhook', (req, res) => {
    const challenge = req.query[CHALLENGE_QUERY_PARAM];
    if (typeof challenge === 'string' && challenge.length > 0) {
      setRequestTrigger('challenge');
      console.log(`✅ Responding to Smartsheet verification with challenge: ${challenge}`);
      res.status(200).type('text/plain').send(challenge);
      return;
    }

    res.status(200).type('text/plain').send('Webhook is running!');
  });

  router.post('/webhook', async (req: Request, res: Response, next: NextFunction) => {
    const challenge = readChallenge(req);
    if (challenge) {
      setRequestTrigger('challenge');
      console.log(`✅ Responding to Smartsheet verification with challenge: ${challenge}`);
      res.setHeader(CHALLENGE_RESPONSE_HEADER, challenge);
      res.status(200).json({ smartsheetHookResponse: challenge });
      return;
    }

    setRequestTrigger('notification');
    console.log('📥 Webhook received!', JSON.stringify(req.body));
    logAction({ type: 'webhook.received', component: 'webhooks' });

    try {
      const reply = await handler.handleNotification(req.body);
      res.status(reply.statusCode).json(reply.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
