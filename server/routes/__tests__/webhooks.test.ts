import express from 'express';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import type { Server } from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { registerRoutes, ROOT_MESSAGE } from '../../routes';
import type { WebhookReply } from '../../webhooks/types';
import { CHALLENGE_HEADER, CHALLENGE_RESPONSE_HEADER } from '../webhooks';

type NotificationHandler = (body: unknown) => Promise<WebhookReply>;

describe('webhook routes', () => {
  let server: Server;
  let baseUrl: string;
  let workDir: string;
  let received: unknown[];
  let respond: NotificationHandler;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'webhook-routes-'));
    received = [];
    respond = async () => ({ statusCode: 200, body: { message: 'File updated & attached!' } });

    server = await registerRoutes(express(), {
      templatePath: path.join(workDir, 'Updated Schedule.xlsx'),
      webhookHandler: {
        handleNotification: (body) => {
          received.push(body);
          return respond(body);
        },
      },
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await rm(workDir, { recursive: true, force: true });
  });

  function postJson(body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}/webhook`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: JSON.stringify(body),
    });
  }

  it('reports that the service is running', async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe(ROOT_MESSAGE);
  });

  it('echoes the verification challenge verbatim', async () => {
    const response = await fetch(`${baseUrl}/webhook?smartsheetHookChallenge=xyz123`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('xyz123');
  });

  it('answers a plain GET without a challenge', async () => {
    const response = await fetch(`${baseUrl}/webhook`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('Webhook is running!');
  });

  it('answers a POSTed challenge without processing it', async () => {
    const response = await postJson({ challenge: 'abc987', webhookId: 5 });

    expect(response.status).toBe(200);
    expect(response.headers.get(CHALLENGE_RESPONSE_HEADER)).toBe('abc987');
    expect(await response.json()).toEqual({ smartsheetHookResponse: 'abc987' });
    expect(received).toEqual([]);
  });

  it('accepts the challenge from the request header', async () => {
    const response = await postJson({}, { [CHALLENGE_HEADER]: 'hdr-42' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ smartsheetHookResponse: 'hdr-42' });
  });

  it('passes notifications to the handler and relays its reply', async () => {
    const payload = { events: [{ rowId: 7, changedColumns: [{ columnTitle: 'Check Box', newValue: 'TRUE' }] }] };
    respond = async () => ({ statusCode: 400, body: { message: 'No active rows to process.' } });

    const response = await postJson(payload);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ message: 'No active rows to process.' });
    expect(received).toEqual([payload]);
  });

  it('returns 500 with the error message when processing throws', async () => {
    respond = async () => {
      throw new Error("ENOENT: no such file or directory, copyfile 'Updated Schedule.xlsx'");
    };

    const response = await postJson({ events: [] });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      message: "ENOENT: no such file or directory, copyfile 'Updated Schedule.xlsx'",
    });
  });

  it('answers unknown paths with a JSON 404', async () => {
    const response = await fetch(`${baseUrl}/nowhere`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'Not found: GET /nowhere' });
  });

  it('tags each response with a request id', async () => {
    const response = await fetch(`${baseUrl}/`, { headers: { 'x-request-id': 'req-1' } });

    expect(response.headers.get('x-request-id')).toBe('req-1');
  });

  it('reports health according to the template file', async () => {
    const missing = await fetch(`${baseUrl}/api/health/app`);
    expect(missing.status).toBe(503);
    expect(await missing.json()).toMatchObject({ success: false, app: { status: 'fail', template: 'missing' } });

    await writeFile(path.join(workDir, 'Updated Schedule.xlsx'), 'placeholder');

    const present = await fetch(`${baseUrl}/api/health/app`);
    expect(present.status).toBe(200);
    expect(await present.json()).toMatchObject({ success: true, app: { status: 'pass', template: 'present' } });
  });
});
