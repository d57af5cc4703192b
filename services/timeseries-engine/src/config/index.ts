// src/config/index.ts
import { z } from 'zod';
import { parseDuration } from '../utils/duration.js';

const Duration = z.string().transform((v, ctx) => {
  try {
    return parseDuration(v);
  } catch (e) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : String(e) });
    return z.NEVER;
  }
});

const Env = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4200),
  API_PREFIX: z.string().default('/api/v1'),
  API_KEY: z.string().default('dev-key'),

  // mirrors are optional; the engine itself is in-process
  DATABASE_URL: z.string().optional(),
  REDIS_URL: z.string().optional(),

  QUEUE_PREFIX: z.string().default('timeseries'),
  INGEST_QUEUE: z.string().default('market-data'),
  PUBSUB_CHANNEL: z.string().default('ch:candles'),

  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),

  // storage
  TS_NAMESPACE: z.string().regex(/^[a-z_][a-z0-9_]*$/).default('timeseries'),
  PRICE_PRECISION: z.coerce.number().int().min(0).max(12).default(6),
  TICK_CHUNK_INTERVAL: Duration.default('1 day'),
  CANDLE_CHUNK_INTERVAL: Duration.default('7 days'),
  CANDLE_CONFLICT_POLICY: z.enum(['ignore', 'error']).default('ignore'),

  // scheduling
  SCHEDULER_TICK: Duration.default('1 second'),
  LIFECYCLE_INTERVAL: Duration.default('1 hour'),
  POLICIES_FILE: z.string().optional(),
});

const e = Env.parse(process.env);

export const cfg = {
  env: e.NODE_ENV,
  port: e.PORT,
  apiPrefix: e.API_PREFIX,
  apiKey: e.API_KEY,

  databaseUrl: e.DATABASE_URL,
  redisUrl: e.REDIS_URL,

  queuePrefix: e.QUEUE_PREFIX,
  ingestQueue: e.INGEST_QUEUE,
  pubsubChannel: e.PUBSUB_CHANNEL,

  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',

  store: {
    namespace: e.TS_NAMESPACE,
    pricePrecision: e.PRICE_PRECISION,
    tickChunkIntervalMs: e.TICK_CHUNK_INTERVAL,
    candleChunkIntervalMs: e.CANDLE_CHUNK_INTERVAL,
    conflictPolicy: e.CANDLE_CONFLICT_POLICY,
  },
  scheduler: {
    tickMs: e.SCHEDULER_TICK,
    lifecycleIntervalMs: e.LIFECYCLE_INTERVAL,
  },
  policiesFile: e.POLICIES_FILE,
} as const;
