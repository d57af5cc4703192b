import { DuplicateKeyError, EngineError } from '../errors.js';
import { ingestRows } from '../metrics/metrics.js';
import type { MarketStore } from '../store/market-store.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { IngestItem } from '../utils/validators.js';

export type IngestTarget = Pick<MarketStore, 'appendTick' | 'appendCandle'>;

export type IngestError = { index: number; code: string; message: string };

export type IngestResult = {
  accepted: number;
  duplicates: number;
  rejected: number;
  skipped: number;
  errors: IngestError[];
};

/**
 * Appends a mixed batch of ticks and candles. Malformed items are skipped,
 * refused writes are counted as rejected, and the rest of the batch still
 * goes through. Only unexpected failures are thrown.
 */
export function ingestItems(target: IngestTarget, items: readonly unknown[], log: Logger = rootLogger): IngestResult {
  const out: IngestResult = { accepted: 0, duplicates: 0, rejected: 0, skipped: 0, errors: [] };

  items.forEach((raw, index) => {
    const parsed = IngestItem.safeParse(raw);
    if (!parsed.success) {
      out.skipped++;
      out.errors.push({ index, code: 'VALIDATION_ERROR', message: parsed.error.issues[0]?.message ?? 'invalid item' });
      ingestRows.inc({ kind: 'unknown', outcome: 'skipped' });
      return;
    }

    const item = parsed.data;
    try {
      if (item.kind === 'tick') {
        target.appendTick(item);
        out.accepted++;
        ingestRows.inc({ kind: 'tick', outcome: 'accepted' });
        return;
      }
      const { outcome } = target.appendCandle(item);
      if (outcome === 'ignored') {
        out.duplicates++;
        ingestRows.inc({ kind: 'candle', outcome: 'duplicate' });
      } else {
        out.accepted++;
        ingestRows.inc({ kind: 'candle', outcome: 'accepted' });
      }
    } catch (err) {
      if (!(err instanceof EngineError)) throw err;
      if (err instanceof DuplicateKeyError) out.duplicates++;
      else out.rejected++;
      out.errors.push({ index, code: err.code, message: err.message });
      ingestRows.inc({ kind: item.kind, outcome: err instanceof DuplicateKeyError ? 'duplicate' : 'rejected' });
    }
  });

  if (out.rejected || out.skipped) {
    log.warn(
      { accepted: out.accepted, duplicates: out.duplicates, rejected: out.rejected, skipped: out.skipped },
      'ingest batch partially refused',
    );
  }
  return out;
}
