import { Registry, Counter, Histogram } from 'prom-client';
export const registry = new Registry();

export const ingestRows = new Counter({
  name: 'ingest_rows_total',
  help: 'Rows offered to the chunk store',
  labelNames: ['kind', 'outcome'],
  registers: [registry],
});
export const aggregateRefreshes = new Counter({
  name: 'aggregate_refresh_total',
  help: 'Continuous aggregate refresh attempts',
  labelNames: ['aggregate', 'status'],
  registers: [registry],
});
export const aggregateRefreshDuration = new Histogram({
  name: 'aggregate_refresh_duration_ms',
  help: 'Continuous aggregate refresh duration',
  labelNames: ['aggregate'],
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000],
  registers: [registry],
});
export const chunksCompressed = new Counter({
  name: 'chunks_compressed_total',
  help: 'Chunks moved to COMPRESSED',
  labelNames: ['table'],
  registers: [registry],
});
export const chunksDropped = new Counter({
  name: 'chunks_dropped_total',
  help: 'Chunks dropped by retention',
  labelNames: ['table'],
  registers: [registry],
});
export const httpReqDuration = new Histogram({
  name: 'http_request_duration_ms',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'code'],
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
  registers: [registry],
});
