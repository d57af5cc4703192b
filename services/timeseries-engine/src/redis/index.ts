import { Redis } from 'ioredis';
import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';

// Single shared client (BullMQ connection, general commands) and a
// dedicated duplicate for publishing
let primary: Redis | null = null;
let publisher: Redis | null = null;

function attachLoggers(client: Redis, label: string) {
  client.on('connect',      () => logger.info({ label }, 'redis connect'));
  client.on('ready',        () => logger.info({ label }, 'redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ label, delay }, 'redis reconnecting'));
  client.on('end',          () => logger.warn({ label }, 'redis end'));
  client.on('error',        (err) => logger.error({ label, err }, 'redis error'));
}

export function getRedis(): Redis {
  if (!primary) {
    if (!cfg.redisUrl) throw new Error('REDIS_URL is not configured');
    primary = new Redis(cfg.redisUrl, {
      maxRetriesPerRequest: null,
      enableAutoPipelining: true,
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

export async function redisHealth(): Promise<boolean> {
  return (await getRedis().ping()) === 'PONG';
}

async function close(client: Redis, label: string) {
  try {
    await client.quit();
  } catch (err) {
    logger.warn({ label, err }, 'redis quit failed, disconnecting');
    client.disconnect();
  }
}

export async function shutdownRedis(): Promise<void> {
  const tasks: Promise<void>[] = [];
  if (publisher) { tasks.push(close(publisher, 'publisher')); publisher = null; }
  if (primary)   { tasks.push(close(primary, 'primary'));     primary   = null; }
  await Promise.all(tasks);
}
