import { createServer, type Server } from 'node:http';
import { describe, test, expect, afterEach, vi } from 'vitest';
import { TEST_USER_ID, quietLogger, setupTest, type TestContext } from './helpers.js';
import { FAKE_API } from './fake-mdb.js';
import { MdbClient } from '../src/client.js';
import { ClientClosedError, NotFoundError } from '../src/errors.js';
import { withClient } from '../src/session.js';

/**
 * Keep-alive HTTP server on a free local port, answering every GET with
 * the resource seeded for its path or a 404
 */
async function startServer(resources: Record<string, object>): Promise<{ server: Server; base: string }> {
  const server = createServer((req, res) => {
    const resource = resources[req.url ?? ''];
    res.writeHead(resource ? 200 : 404, { 'content-type': 'application/json' });
    res.end(JSON.stringify(resource ?? { message: 'not found' }));
  });
  server.keepAliveTimeout = 60_000;
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server has no TCP address');
  }
  return { server, base: `http://127.0.0.1:${address.port}` };
}

function openConnections(server: Server): Promise<number> {
  return new Promise((resolve, reject) =>
    server.getConnections((error, count) => (error ? reject(error) : resolve(count)))
  );
}

function stopServer(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
}

describe('SESSION Tests', () => {
  const contexts: TestContext[] = [];

  afterEach(async () => {
    await Promise.all(contexts.map(ctx => ctx.cleanup()));
    contexts.length = 0;
  });

  test('SESSION-001: Scoped client is closed after success', async () => {
    const ctx = await setupTest('session-001');
    contexts.push(ctx);

    const uri = `${FAKE_API}/masterEO/s`;
    ctx.mdb.seed(uri, { resId: 's', title: 'scoped' });

    const title = await withClient(ctx.client, async client => (await client.open(uri)).title);

    expect(title).toBe('scoped');
    expect(ctx.client.closed).toBe(true);
  });

  test('SESSION-002: Scoped client is closed after failure', async () => {
    const ctx = await setupTest('session-002');
    contexts.push(ctx);

    const result = withClient(ctx.client, async client => client.open(`${FAKE_API}/masterEO/missing`));

    await expect(result).rejects.toThrow(/HTTP 404/);
    expect(ctx.client.closed).toBe(true);
  });

  test('SESSION-003: Closed client sends nothing', async () => {
    const ctx = await setupTest('session-003');
    contexts.push(ctx);

    await ctx.client.close();

    await expect(ctx.client.open(`${FAKE_API}/masterEO/x`)).rejects.toThrow(ClientClosedError);
    await expect(ctx.client.createMasterEO({ title: 'late' })).rejects.toThrow('Client is closed');
    expect(ctx.mdb.requests).toHaveLength(0);
  });

  test('SESSION-004: Closing aborts a request in flight', async () => {
    const ctx = await setupTest('session-004');
    contexts.push(ctx);

    const uri = `${FAKE_API}/masterEO/slow`;
    ctx.mdb.stall('GET', uri);

    const pending = ctx.client.open(uri);
    await ctx.client.close();

    await expect(pending).rejects.toThrow(`Client closed before request to ${uri} completed`);
    expect(ctx.mdb.requests).toHaveLength(1);
  });

  test('SESSION-005: Close is idempotent', async () => {
    const ctx = await setupTest('session-005');
    contexts.push(ctx);

    await ctx.client.close();
    await ctx.client.close();

    expect(ctx.client.closed).toBe(true);
    expect(ctx.logger.trace).toHaveBeenCalledTimes(1);
    expect(ctx.logger.trace).toHaveBeenCalledWith('mdb session closed');
  });

  test('SESSION-006: Connection released after a scoped success', async () => {
    const { server, base } = await startServer({ '/api/masterEO/live': { resId: 'live', title: 'over http' } });
    try {
      const client = new MdbClient(base, { userId: TEST_USER_ID, logger: quietLogger() });

      const title = await withClient(client, async c => (await c.open(`${base}/api/masterEO/live`)).title);

      expect(title).toBe('over http');
      await vi.waitFor(async () => expect(await openConnections(server)).toBe(0));
    } finally {
      await stopServer(server);
    }
  });

  test('SESSION-007: Connection released after a scoped failure', async () => {
    const { server, base } = await startServer({});
    try {
      const client = new MdbClient(base, { userId: TEST_USER_ID, logger: quietLogger() });

      const result = withClient(client, async c => c.open(`${base}/api/masterEO/gone`));

      await expect(result).rejects.toThrow(NotFoundError);
      expect(client.closed).toBe(true);
      await vi.waitFor(async () => expect(await openConnections(server)).toBe(0));
    } finally {
      await stopServer(server);
    }
  });
});
