import http from 'node:http';
import { logger } from '../utils/logger.js';
import { dbHealth } from '../db/pool.js';
import { getRedis } from '../redis/index.js';
import { opsRegistry } from '../metrics/metrics.js';

export function startOpsServer(port: number) {
  const server = http.createServer(async (req, res) => {
    try {
      if (!req.url) {
        res.statusCode = 400;
        res.end('bad request');
        return;
      }
      if (req.url === '/ops/health/liveness') {
        res.setHeader('content-type', 'application/json');
        res.end(JSON.stringify({ ok: true }));
        return;
      }
      if (req.url === '/ops/health/readiness') {
        const checks: Record<string, 'ok' | 'fail'> = { redis: 'ok', db: 'ok' };
        try {
          await getRedis().ping();
        } catch (err) {
          logger.warn({ err }, 'readiness: redis ping failed');
          checks.redis = 'fail';
        }
        try {
          await dbHealth();
        } catch (err) {
          logger.warn({ err }, 'readiness: db query failed');
          checks.db = 'fail';
        }
        const ready = Object.values(checks).every((v) => v === 'ok');
        res.statusCode = ready ? 200 : 503;
        res.setHeader('content-type', 'application/json');
        res.end(JSON.stringify({ status: ready ? 'ready' : 'not_ready', checks }));
        return;
      }
      if (req.url === '/ops/metrics') {
        res.setHeader('content-type', opsRegistry.contentType);
        res.end(await opsRegistry.metrics());
        return;
      }

      // default 404
      res.statusCode = 404;
      res.setHeader('content-type', 'application/json');
      res.end(JSON.stringify({ error: { code: 'NOT_FOUND', message: 'unknown path' } }));
    } catch (err) {
      logger.error({ err, url: req.url }, 'ops request failed');
      res.statusCode = 500;
      res.setHeader('content-type', 'application/json');
      res.end(JSON.stringify({ error: { code: 'INTERNAL', message: 'unexpected error' } }));
    }
  });

  server.listen(port, () => {
    logger.info({ port }, 'ops server listening');
  });

  return server;
}
