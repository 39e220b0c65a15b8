import { Redis } from 'ioredis';
import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';

// One shared client for BullMQ and commands, plus a duplicate for publishing
let primary: Redis | null = null;
let publisher: Redis | null = null;

function attachLoggers(client: Redis, label: string) {
  client.on('ready',        () => logger.info({ label }, 'redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ label, delay }, 'redis reconnecting'));
  client.on('end',          () => logger.warn({ label }, 'redis end'));
  client.on('error',        (err) => logger.error({ label, err }, 'redis error'));
}

export function getRedis(): Redis {
  if (!primary) {
    primary = new Redis(cfg.redisUrl, {
      maxRetriesPerRequest: null,
      enableAutoPipelining: true,
      lazyConnect: false,
    });
    attachLoggers(primary, 'primary');
  }
  return primary;
}

// BullMQ accepts an ioredis instance as "connection"
export function getBullConnection(): Redis {
  return getRedis();
}

export function getPublisher(): Redis {
  if (!publisher) {
    publisher = getRedis().duplicate();
    attachLoggers(publisher, 'publisher');
  }
  return publisher;
}

async function quit(client: Redis, label: string): Promise<void> {
  try {
    await client.quit();
  } catch (err) {
    logger.warn({ label, err }, 'redis quit failed, disconnecting');
    client.disconnect();
  }
}

export async function shutdownRedis(): Promise<void> {
  const tasks: Promise<void>[] = [];
  if (publisher) { tasks.push(quit(publisher, 'publisher')); publisher = null; }
  if (primary)   { tasks.push(quit(primary, 'primary'));     primary   = null; }
  await Promise.all(tasks);
}
