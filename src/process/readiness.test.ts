import { describe, it, expect, afterEach } from 'vitest';
import http from 'node:http';
import { waitForHttp, checkOnce, acceptListening } from './readiness.js';

let server: http.Server | null = null;

function portOf(s: http.Server): number {
  const address = s.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP');
  return address.port;
}

function listen(handler: http.RequestListener): Promise<string> {
  const s = http.createServer(handler);
  server = s;
  return new Promise((resolve) => {
    s.listen(0, '127.0.0.1', () => resolve(`http://127.0.0.1:${portOf(s)}`));
  });
}

async function unusedUrl(): Promise<string> {
  const spare = http.createServer();
  await new Promise<void>((resolve) => spare.listen(0, '127.0.0.1', () => resolve()));
  const port = portOf(spare);
  await new Promise<void>((resolve) => spare.close(() => resolve()));
  return `http://127.0.0.1:${port}`;
}

afterEach(async () => {
  const s = server;
  server = null;
  if (s) await new Promise<void>((resolve) => s.close(() => resolve()));
});

describe('checkOnce', () => {
  it('accepts 200 by default', async () => {
    const base = await listen((_req, res) => res.end('ok'));
    expect(await checkOnce(`${base}/health`)).toBe(true);
  });

  it('rejects 503 by default', async () => {
    const base = await listen((_req, res) => { res.statusCode = 503; res.end(); });
    expect(await checkOnce(`${base}/health`)).toBe(false);
  });

  it('accepts 404 when only listening matters', async () => {
    const base = await listen((_req, res) => { res.statusCode = 404; res.end(); });
    expect(await checkOnce(base, { accept: acceptListening })).toBe(true);
  });

  it('returns false when nothing is listening', async () => {
    expect(await checkOnce(await unusedUrl())).toBe(false);
  });
});

describe('waitForHttp', () => {
  it('keeps polling until the endpoint reports ready', async () => {
    let hits = 0;
    const base = await listen((_req, res) => {
      hits++;
      res.statusCode = hits < 3 ? 503 : 200;
      res.end();
    });

    const ready = await waitForHttp(`${base}/health`, { timeoutMs: 5000, initialDelayMs: 5, maxDelayMs: 20 });
    expect(ready).toBe(true);
    expect(hits).toBe(3);
  });

  it('gives up once the deadline passes', async () => {
    const base = await listen((_req, res) => { res.statusCode = 503; res.end(); });
    const started = Date.now();
    const ready = await waitForHttp(`${base}/health`, { timeoutMs: 100, initialDelayMs: 10, maxDelayMs: 20 });
    expect(ready).toBe(false);
    expect(Date.now() - started).toBeGreaterThanOrEqual(100);
  });

  it('stops when the signal aborts', async () => {
    const url = await unusedUrl();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);
    const ready = await waitForHttp(url, { timeoutMs: 10_000, initialDelayMs: 5, maxDelayMs: 10, signal: controller.signal });
    expect(ready).toBe(false);
  });
});
