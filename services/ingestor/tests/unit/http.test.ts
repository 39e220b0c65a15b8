import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'node:http';

const { ping, dbHealth } = vi.hoisted(() => ({
  ping: vi.fn(async () => 'PONG'),
  dbHealth: vi.fn(async () => true),
}));
vi.mock('../../src/redis/index.js', () => ({ getRedis: () => ({ ping }) }));
vi.mock('../../src/db/pool.js', () => ({ dbHealth }));

import { startOpsServer } from '../../src/server/http.js';

describe('ops server', () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    server = startOpsServer(0);
    await new Promise<void>((res) => server.once('listening', () => res()));
    const addr = server.address();
    if (!addr || typeof addr === 'string') throw new Error('ops server has no tcp address');
    base = `http://127.0.0.1:${addr.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((res) => server.close(() => res()));
  });

  beforeEach(() => {
    ping.mockResolvedValue('PONG');
    dbHealth.mockResolvedValue(true);
  });

  it('answers liveness', async () => {
    const res = await fetch(`${base}/ops/health/liveness`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it('reports ready when redis and postgres respond', async () => {
    const res = await fetch(`${base}/ops/health/readiness`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ready', checks: { redis: 'ok', db: 'ok' } });
  });

  it('returns 503 when a dependency is down', async () => {
    dbHealth.mockRejectedValue(new Error('connection refused'));

    const res = await fetch(`${base}/ops/health/readiness`);

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ status: 'not_ready', checks: { redis: 'ok', db: 'fail' } });
  });

  it('serves worker and engine metrics together', async () => {
    const body = await (await fetch(`${base}/ops/metrics`)).text();
    expect(body).toContain('ingestor_jobs_total');
    expect(body).toContain('pricebase_bars_ingested_total');
  });

  it('404s unknown paths', async () => {
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
  });
});
