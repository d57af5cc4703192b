import { ChunkImmutableError, DuplicateKeyError, InvalidArgumentError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type {
  AppendOutcome,
  ChunkInfo,
  ChunkState,
  ConflictPolicy,
  TimeRange,
  TimeRow,
  UpsertOutcome,
} from '../types/domain.js';
import {
  decodeSegment,
  encodeSegments,
  validateLayout,
  type ColumnarSegment,
  type SegmentLayout,
  type StoredRow,
  type TableSchema,
} from './columnar.js';

export type HypertableOptions = {
  namespace: string;
  chunkIntervalMs: number;
  conflictPolicy?: ConflictPolicy;
  logger?: Logger;
};

/** The part of a table the lifecycle jobs work against. */
export interface ManagedTable {
  readonly name: string;
  readonly qualifiedName: string;
  listChunks(): ChunkInfo[];
  validateLayout(layout: SegmentLayout): void;
  compressChunk(chunkId: string, layout: SegmentLayout): ChunkInfo;
  dropChunk(chunkId: string): ChunkInfo;
}

export function assertRange(range: TimeRange): void {
  if (!Number.isFinite(range.start) || Number.isNaN(range.end) || range.start > range.end) {
    throw new InvalidArgumentError(`malformed range [${range.start}, ${range.end})`);
  }
}

function frozenCopy<R extends TimeRow>(row: R): R {
  const copy: R = { ...row };
  Object.freeze(copy);
  return copy;
}

// first index whose time is >= t
function lowerBound<R extends TimeRow>(rows: readonly StoredRow<R>[], t: number): number {
  let lo = 0;
  let hi = rows.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (rows[mid].row.time < t) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

// first index whose time is > t
function upperBound<R extends TimeRow>(rows: readonly StoredRow<R>[], t: number): number {
  let lo = 0;
  let hi = rows.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (rows[mid].row.time <= t) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

class Chunk<R extends TimeRow> {
  state: ChunkState = 'OPEN';
  private rows: StoredRow<R>[] = [];
  private readonly keys = new Map<string, StoredRow<R>>();
  private segments: ColumnarSegment[] = [];
  private count = 0;

  constructor(
    readonly id: string,
    readonly table: string,
    readonly rangeStart: number,
    readonly rangeEnd: number,
  ) {}

  info(): ChunkInfo {
    return {
      id: this.id,
      table: this.table,
      rangeStart: this.rangeStart,
      rangeEnd: this.rangeEnd,
      state: this.state,
      rowCount: this.count,
    };
  }

  assertWritable() {
    if (this.state !== 'OPEN') throw new ChunkImmutableError(this.id, this.state);
  }

  find(key: string): StoredRow<R> | undefined {
    return this.keys.get(key);
  }

  insert(entry: StoredRow<R>, key: string | undefined) {
    // sequence numbers only grow, so ties land after existing rows
    this.rows.splice(upperBound(this.rows, entry.row.time), 0, entry);
    if (key !== undefined) this.keys.set(key, entry);
    this.count += 1;
  }

  /** Rows in `[start, end)` ordered by time, then insertion. */
  scan(schema: TableSchema<R>, range: TimeRange, symbol?: string): StoredRow<R>[] {
    if (this.state === 'OPEN') {
      const out: StoredRow<R>[] = [];
      for (let i = lowerBound(this.rows, range.start); i < this.rows.length; i++) {
        const e = this.rows[i];
        if (e.row.time >= range.end) break;
        if (symbol === undefined || e.row.symbol === symbol) out.push(e);
      }
      return out;
    }

    const out: StoredRow<R>[] = [];
    for (const seg of this.segments) {
      const segSymbol = seg.segmentValues.get('symbol');
      if (symbol !== undefined && segSymbol !== undefined && segSymbol !== symbol) continue;
      for (const e of decodeSegment(schema, seg)) {
        if (e.row.time < range.start || e.row.time >= range.end) continue;
        if (symbol === undefined || e.row.symbol === symbol) out.push(e);
      }
    }
    return out.sort((a, b) => a.row.time - b.row.time || a.seq - b.seq);
  }

  compress(schema: TableSchema<R>, layout: SegmentLayout) {
    this.segments = encodeSegments(schema, this.rows, layout);
    this.rows = [];
    this.keys.clear();
    this.state = 'COMPRESSED';
  }

  expire() {
    this.rows = [];
    this.segments = [];
    this.keys.clear();
    this.count = 0;
    this.state = 'EXPIRED';
  }
}

/**
 * Append-only table partitioned into fixed-width time chunks. Every chunk
 * operation completes synchronously, so a write, a compression and a drop
 * never interleave on the same chunk.
 */
export class Hypertable<R extends TimeRow> implements ManagedTable {
  readonly name: string;
  readonly qualifiedName: string;
  readonly chunkIntervalMs: number;
  private readonly conflictPolicy: ConflictPolicy;
  private readonly log: Logger;
  private readonly chunks = new Map<number, Chunk<R>>();
  private starts: number[] = [];
  private seq = 0;

  constructor(private readonly schema: TableSchema<R>, opts: HypertableOptions) {
    if (!(opts.chunkIntervalMs > 0)) throw new InvalidArgumentError('chunk interval must be positive');
    this.name = schema.name;
    this.qualifiedName = `${opts.namespace}.${schema.name}`;
    this.chunkIntervalMs = opts.chunkIntervalMs;
    this.conflictPolicy = opts.conflictPolicy ?? 'ignore';
    this.log = (opts.logger ?? rootLogger).child({ table: this.qualifiedName });
  }

  append(row: R): AppendOutcome {
    const chunk = this.chunkFor(row.time);
    chunk.assertWritable();

    const key = this.schema.uniqueKey?.(row);
    if (key !== undefined && chunk.find(key)) {
      if (this.conflictPolicy === 'error') throw new DuplicateKeyError(this.qualifiedName, key);
      return 'ignored';
    }
    chunk.insert({ row: frozenCopy(row), seq: this.seq++ }, key);
    return 'inserted';
  }

  /** Replace-on-conflict insert; the table must define a unique key. */
  upsert(row: R): UpsertOutcome {
    const keyOf = this.schema.uniqueKey;
    if (!keyOf) throw new InvalidArgumentError(`${this.qualifiedName} has no unique key`);

    const chunk = this.chunkFor(row.time);
    chunk.assertWritable();

    const key = keyOf(row);
    const existing = chunk.find(key);
    if (existing) {
      existing.row = frozenCopy(row);
      return 'replaced';
    }
    chunk.insert({ row: frozenCopy(row), seq: this.seq++ }, key);
    return 'inserted';
  }

  /** Fails when the chunk covering `time` exists and is no longer OPEN. */
  assertWritable(time: number): void {
    const chunk = this.chunks.get(Math.floor(time / this.chunkIntervalMs) * this.chunkIntervalMs);
    chunk?.assertWritable();
  }

  readRange(range: TimeRange, symbol?: string): R[] {
    assertRange(range);
    const out: R[] = [];
    for (const start of this.starts) {
      if (start >= range.end) break;
      if (start + this.chunkIntervalMs <= range.start) continue;
      const chunk = this.chunks.get(start);
      if (!chunk || chunk.state === 'EXPIRED') continue;
      for (const e of chunk.scan(this.schema, range, symbol)) out.push(e.row);
    }
    return out;
  }

  /** Most recent rows for a symbol, newest first. */
  latest(symbol: string, limit: number): R[] {
    const out: R[] = [];
    for (let i = this.starts.length - 1; i >= 0 && out.length < limit; i--) {
      const chunk = this.chunks.get(this.starts[i]);
      if (!chunk || chunk.state === 'EXPIRED') continue;
      const rows = chunk.scan(this.schema, { start: chunk.rangeStart, end: chunk.rangeEnd }, symbol);
      for (let j = rows.length - 1; j >= 0 && out.length < limit; j--) out.push(rows[j].row);
    }
    return out;
  }

  listChunks(): ChunkInfo[] {
    return this.starts.flatMap((s) => {
      const chunk = this.chunks.get(s);
      return chunk ? [chunk.info()] : [];
    });
  }

  validateLayout(layout: SegmentLayout): void {
    validateLayout(this.schema, layout);
  }

  /** OPEN → COMPRESSED. Chunks in any other state are left as they are. */
  compressChunk(chunkId: string, layout: SegmentLayout): ChunkInfo {
    const chunk = this.chunkById(chunkId);
    if (chunk.state === 'OPEN') {
      chunk.compress(this.schema, layout);
      this.log.debug({ chunk: chunkId }, 'chunk compressed');
    }
    return chunk.info();
  }

  /** Drops every row of the chunk at once and keeps it as an EXPIRED tombstone. */
  dropChunk(chunkId: string): ChunkInfo {
    const chunk = this.chunkById(chunkId);
    const before = chunk.info();
    if (chunk.state !== 'EXPIRED') chunk.expire();
    return before;
  }

  private chunkById(chunkId: string): Chunk<R> {
    for (const chunk of this.chunks.values()) {
      if (chunk.id === chunkId) return chunk;
    }
    throw new InvalidArgumentError(`unknown chunk ${chunkId} in ${this.qualifiedName}`);
  }

  private chunkFor(time: number): Chunk<R> {
    if (!Number.isFinite(time)) throw new InvalidArgumentError(`invalid time ${time}`);
    const start = Math.floor(time / this.chunkIntervalMs) * this.chunkIntervalMs;
    let chunk = this.chunks.get(start);
    if (!chunk) {
      chunk = new Chunk<R>(`${this.name}_${start}`, this.qualifiedName, start, start + this.chunkIntervalMs);
      this.chunks.set(start, chunk);
      const at = this.starts.findIndex((s) => s > start);
      this.starts.splice(at === -1 ? this.starts.length : at, 0, start);
      this.log.debug({ chunk: chunk.id, rangeStart: start }, 'chunk created');
    }
    return chunk;
  }
}
