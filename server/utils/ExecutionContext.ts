import { AsyncLocalStorage } from 'node:async_hooks';

interface RequestContext {
  requestId: string;
  trigger?: 'challenge' | 'notification';
}

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

export function setRequestTrigger(trigger: RequestContext['trigger']): void {
  const ctx = storage.getStore();
  if (ctx) {
    ctx.trigger = trigger;
  }
}
