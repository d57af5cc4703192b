import { collectDefaultMetrics } from 'prom-client';
import { buildApp } from './app.js';
import { cfg } from './config/index.js';
import { loadPolicies } from './config/policies.js';
import { closePool, dbHealth, getPool } from './db/pool.js';
import { createEngine } from './engine.js';
import { registry } from './metrics/metrics.js';
import { startWorker } from './queue/worker.js';
import { getPublisher, redisHealth, shutdownRedis } from './redis/index.js';
import { RedisCandlePublisher } from './redis/pub.js';
import { PgCandleSink, ensureCandleTable } from './repositories/candles.repo.js';
import type { CandleSink } from './services/continuous-aggregate.js';
import { logger } from './utils/logger.js';

collectDefaultMetrics({ register: registry });

const sinks: CandleSink[] = [];
if (cfg.databaseUrl) {
  await ensureCandleTable(getPool(), cfg.store.namespace);
  sinks.push(new PgCandleSink(getPool(), cfg.store.namespace));
}
if (cfg.redisUrl) sinks.push(new RedisCandlePublisher(getPublisher(), cfg.pubsubChannel));

const engine = createEngine({ sinks });
engine.applyPolicies(loadPolicies(cfg.policiesFile));
engine.start();

const queue = cfg.redisUrl ? startWorker(engine) : null;

const app = buildApp(engine, {
  apiKey: cfg.apiKey,
  probes: {
    db: cfg.databaseUrl ? dbHealth : undefined,
    redis: cfg.redisUrl ? redisHealth : undefined,
  },
});
const server = app.listen(cfg.port, () => {
  logger.info(
    {
      port: cfg.port,
      prefix: cfg.apiPrefix,
      namespace: cfg.store.namespace,
      queue: queue ? cfg.ingestQueue : undefined,
      sinks: sinks.map((s) => s.name),
    },
    'timeseries engine listening'
  );
});

// ---- global process error traps ----
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaughtException');
  void shutdown('uncaughtException', 1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'unhandledRejection');
  void shutdown('unhandledRejection', 1);
});

process.on('SIGINT', () => void shutdown('SIGINT', 0));
process.on('SIGTERM', () => void shutdown('SIGTERM', 0));

let closing = false;
async function shutdown(sig: string, code: number) {
  if (closing) return;
  closing = true;
  logger.warn({ sig }, 'shutting down');

  await new Promise<void>((res) => server.close(() => res()));
  await engine.stop();

  const results = await Promise.allSettled([
    queue ? queue.worker.close() : Promise.resolve(),
    queue ? queue.qevents.close() : Promise.resolve(),
  ]);
  const closed = await Promise.allSettled([shutdownRedis(), closePool()]);
  for (const r of [...results, ...closed]) {
    if (r.status === 'rejected') logger.error({ err: r.reason }, 'error during shutdown');
  }

  logger.info('bye');
  process.exit(code);
}
