import { Worker, QueueEvents } from 'bullmq';
import { cfg } from '../config/index.js';
import type { TimeseriesEngine } from '../engine.js';
import type { IngestResult } from '../services/ingest.service.js';
import { logger } from '../utils/logger.js';
import { getBullConnection } from '../redis/index.js';

/** Job payload: one `{ kind: 'tick' | 'candle', ... }` item or an array of them. */
export type IngestJob = unknown;

export function processIngestJob(engine: Pick<TimeseriesEngine, 'ingest'>, data: IngestJob): IngestResult {
  const items = Array.isArray(data) ? data : [data];
  return engine.ingest(items);
}

export function startWorker(engine: Pick<TimeseriesEngine, 'ingest'>) {
  // IMPORTANT: queueName has NO colon; namespacing via `prefix`
  const queueName = cfg.ingestQueue;
  const connection = getBullConnection();

  // the store is single-writer, so jobs are taken one at a time
  const worker = new Worker<IngestJob, IngestResult>(
    queueName,
    async (job) => processIngestJob(engine, job.data),
    {
      connection,
      concurrency: 1,
      lockDuration: 30000,
      prefix: cfg.queuePrefix,
    }
  );

  worker.on('completed', (job, res) => logger.debug({ id: job.id, accepted: res.accepted }, '[worker] completed'));
  worker.on('failed', (job, err) => logger.error({ id: job?.id, err }, '[worker] failed'));

  const qevents = new QueueEvents(queueName, {
    connection,
    prefix: cfg.queuePrefix,
  });
  qevents.on('error', (e) => logger.error({ err: e }, '[queueEvents] error'));

  return { worker, qevents };
}
