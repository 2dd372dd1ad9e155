import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'http';
import { createApp } from '../app';
import { createFakeClient } from '../testing/fake-printer-service';
import { listen, shutdown } from '../testing/http-server';
import { AuthenticationError, InvalidContentError, TimeoutError } from '../utils/errors';
import { statusForError } from './print.routes';

describe('statusForError', () => {
  it('maps error kinds to HTTP statuses', () => {
    expect(statusForError(new AuthenticationError('token-rejected', 'refused'))).toBe(401);
    expect(statusForError(new InvalidContentError('empty'))).toBe(422);
    expect(statusForError(new TimeoutError('http://printer.test', 100))).toBe(504);
    expect(statusForError(new Error('boom'))).toBe(502);
  });
});

describe('print routes', () => {
  const { fake, client } = createFakeClient();
  const server = http.createServer(createApp(client));
  let baseUrl = '';

  beforeAll(async () => {
    baseUrl = await listen(server);
  });

  afterAll(() => shutdown(server));

  async function post(path: string, body: unknown) {
    const res = await fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  it('prints text', async () => {
    expect(await post('/api/print/text', { text: 'Hello' })).toEqual({
      status: 200,
      body: { success: true, data: { contentId: 42, contentIds: [42] } },
    });
  });

  it('rejects a request without text', async () => {
    const { status, body } = await post('/api/print/text', {});
    expect(status).toBe(400);
    expect(body).toMatchObject({ success: false, kind: 'ValidationError' });
  });

  it('rejects undecodable image data', async () => {
    expect(await post('/api/print/image', { data: '%%%' })).toEqual({
      status: 422,
      body: { success: false, error: 'Image data is not valid base64', kind: 'InvalidImageError' },
    });
  });

  it('prints combined content', async () => {
    expect(
      await post('/api/print/content', {
        parts: [
          { type: 'text', text: 'a' },
          { type: 'text', text: 'b' },
        ],
      })
    ).toEqual({ status: 200, body: { success: true, data: { contentId: 43 } } });
    expect(fake.lastPrint?.body.printcontent).toBe('T:YQo=|T:Yg==');
  });

  it('rejects an empty image path', async () => {
    const { status, body } = await post('/api/print/image-file', { path: '' });
    expect(status).toBe(400);
    expect(body).toMatchObject({ success: false, kind: 'ValidationError' });
  });

  it('reports print status', async () => {
    fake.printFlag = 0;
    const res = await fetch(`${baseUrl}/api/print/42/status`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, data: { contentId: 42, status: 'PENDING' } });
  });

  it.each(['GET', 'DELETE'])('answers %s /mcp with 405', async (method) => {
    const res = await fetch(`${baseUrl}/mcp`, { method });

    expect(res.status).toBe(405);
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  });

  it('answers health checks', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(await res.json()).toMatchObject({ success: true, service: 'memobird-print-bridge' });
  });
});
