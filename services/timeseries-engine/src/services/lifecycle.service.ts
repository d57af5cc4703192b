import { chunksCompressed, chunksDropped } from '../metrics/metrics.js';
import type { SegmentLayout } from '../store/columnar.js';
import type { ManagedTable } from '../store/hypertable.js';
import type { ChunkInfo } from '../types/domain.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export type CompressionPolicy = { table: string; layout: SegmentLayout; ageThresholdMs: number };
export type RetentionPolicy = { table: string; ageThresholdMs: number };

export type CompressResult = { table: string; cutoff: number; compressed: ChunkInfo[] };
export type RetainResult = {
  table: string;
  cutoff: number;
  dropped: ChunkInfo[];
  failed: Array<{ chunk: ChunkInfo; error: string }>;
};

type JobOptions = { signal?: AbortSignal; logger?: Logger };

function range(chunk: ChunkInfo) {
  return {
    chunk: chunk.id,
    rows: chunk.rowCount,
    rangeStart: new Date(chunk.rangeStart).toISOString(),
    rangeEnd: new Date(chunk.rangeEnd).toISOString(),
  };
}

/**
 * Compresses every OPEN chunk that ends at or before `olderThan`. Chunks
 * straddling the cutoff stay OPEN; re-running is a no-op.
 */
export function compressChunks(
  table: ManagedTable,
  olderThan: number,
  layout: SegmentLayout,
  opts: JobOptions = {},
): CompressResult {
  const log = opts.logger ?? rootLogger;
  table.validateLayout(layout);

  const compressed: ChunkInfo[] = [];
  for (const chunk of table.listChunks()) {
    if (chunk.state !== 'OPEN' || chunk.rangeEnd > olderThan) continue;
    opts.signal?.throwIfAborted();
    compressed.push(table.compressChunk(chunk.id, layout));
    chunksCompressed.inc({ table: table.qualifiedName });
    log.info({ table: table.qualifiedName, ...range(chunk) }, 'chunk compressed');
  }
  return { table: table.qualifiedName, cutoff: olderThan, compressed };
}

/**
 * Drops every chunk that ends at or before `now - maxAgeMs`, one chunk at a
 * time. A failed drop leaves that chunk whole and is reported, not thrown.
 */
export function retainChunks(
  table: ManagedTable,
  maxAgeMs: number,
  now: number,
  opts: JobOptions = {},
): RetainResult {
  const log = opts.logger ?? rootLogger;
  const cutoff = now - maxAgeMs;

  const dropped: ChunkInfo[] = [];
  const failed: RetainResult['failed'] = [];
  for (const chunk of table.listChunks()) {
    if (chunk.state === 'EXPIRED' || chunk.rangeEnd > cutoff) continue;
    opts.signal?.throwIfAborted();
    try {
      dropped.push(table.dropChunk(chunk.id));
      chunksDropped.inc({ table: table.qualifiedName });
      log.info({ table: table.qualifiedName, ...range(chunk) }, 'chunk dropped');
    } catch (err) {
      log.error({ err, table: table.qualifiedName, ...range(chunk) }, 'chunk drop failed');
      failed.push({ chunk, error: err instanceof Error ? err.message : String(err) });
    }
  }
  return { table: table.qualifiedName, cutoff, dropped, failed };
}
