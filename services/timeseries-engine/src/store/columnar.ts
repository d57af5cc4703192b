import { InvalidArgumentError } from '../errors.js';
import type { TimeRow } from '../types/domain.js';

/**
 * Column accessors for one logical table. Text columns can serve as segment
 * keys, numeric columns as order keys; `rebuild` turns decoded columns back
 * into a row.
 */
export interface TableSchema<R extends TimeRow> {
  readonly name: string;
  readonly textColumns: Readonly<Record<string, (row: R) => string>>;
  readonly numericColumns: Readonly<Record<string, (row: R) => number | null>>;
  rebuild(time: number, text: ReadonlyMap<string, string>, numeric: ReadonlyMap<string, number | null>): R;
  readonly uniqueKey?: (row: R) => string;
}

export type SortDirection = 'asc' | 'desc';

export type SegmentLayout = {
  segmentBy: readonly string[];
  orderBy: { column: string; direction: SortDirection };
};

/** A row plus its insertion sequence, which breaks ties between equal timestamps. */
export type StoredRow<R> = { row: R; seq: number };

export type ColumnarSegment = {
  readonly key: string;
  readonly segmentValues: ReadonlyMap<string, string>;
  readonly count: number;
  readonly time: Float64Array;   // delta-encoded, in order-key order
  readonly seq: Float64Array;    // delta-encoded
  readonly text: ReadonlyMap<string, readonly string[]>;
  readonly numeric: ReadonlyMap<string, Float64Array>;  // NaN marks null
};

export function deltaEncode(values: readonly number[]): Float64Array {
  const out = new Float64Array(values.length);
  let prev = 0;
  values.forEach((v, i) => {
    out[i] = v - prev;
    prev = v;
  });
  return out;
}

export function deltaDecode(deltas: Float64Array): number[] {
  let acc = 0;
  return Array.from(deltas, (d) => (acc += d));
}

export function validateLayout<R extends TimeRow>(schema: TableSchema<R>, layout: SegmentLayout): void {
  for (const col of layout.segmentBy) {
    if (!(col in schema.textColumns)) {
      throw new InvalidArgumentError(`segment_by column "${col}" is not a text column of ${schema.name}`);
    }
  }
  const { column } = layout.orderBy;
  if (column !== 'time' && !(column in schema.numericColumns)) {
    throw new InvalidArgumentError(`order_by column "${column}" is not sortable in ${schema.name}`);
  }
}

function segmentKey<R extends TimeRow>(schema: TableSchema<R>, layout: SegmentLayout, row: R): string {
  return layout.segmentBy.map((c) => schema.textColumns[c](row)).join('\u0000');
}

function orderValue<R extends TimeRow>(schema: TableSchema<R>, column: string, row: R): number {
  if (column === 'time') return row.time;
  return schema.numericColumns[column](row) ?? Number.NEGATIVE_INFINITY;
}

/**
 * Re-encodes rows into one columnar segment per distinct segment key,
 * sorted by the order key (insertion sequence breaks ties).
 */
export function encodeSegments<R extends TimeRow>(
  schema: TableSchema<R>,
  rows: readonly StoredRow<R>[],
  layout: SegmentLayout,
): ColumnarSegment[] {
  validateLayout(schema, layout);

  const groups = new Map<string, StoredRow<R>[]>();
  for (const entry of rows) {
    const k = segmentKey(schema, layout, entry.row);
    const g = groups.get(k);
    if (g) g.push(entry);
    else groups.set(k, [entry]);
  }

  const sign = layout.orderBy.direction === 'desc' ? -1 : 1;
  const segments: ColumnarSegment[] = [];

  for (const [key, group] of groups) {
    group.sort((a, b) => {
      const d = orderValue(schema, layout.orderBy.column, a.row) - orderValue(schema, layout.orderBy.column, b.row);
      return d !== 0 ? sign * d : a.seq - b.seq;
    });

    const first = group[0].row;
    const segmentValues = new Map(layout.segmentBy.map((c) => [c, schema.textColumns[c](first)] as const));

    const text = new Map<string, string[]>();
    for (const [name, get] of Object.entries(schema.textColumns)) {
      if (!segmentValues.has(name)) text.set(name, group.map((e) => get(e.row)));
    }
    const numeric = new Map<string, Float64Array>();
    for (const [name, get] of Object.entries(schema.numericColumns)) {
      numeric.set(name, Float64Array.from(group, (e) => get(e.row) ?? Number.NaN));
    }

    segments.push({
      key,
      segmentValues,
      count: group.length,
      time: deltaEncode(group.map((e) => e.row.time)),
      seq: deltaEncode(group.map((e) => e.seq)),
      text,
      numeric,
    });
  }
  return segments;
}

export function decodeSegment<R extends TimeRow>(schema: TableSchema<R>, seg: ColumnarSegment): StoredRow<R>[] {
  const times = deltaDecode(seg.time);
  const seqs = deltaDecode(seg.seq);
  const out: StoredRow<R>[] = [];

  for (let i = 0; i < seg.count; i++) {
    const text = new Map(seg.segmentValues);
    for (const [name, values] of seg.text) text.set(name, values[i]);
    const numeric = new Map<string, number | null>();
    for (const [name, values] of seg.numeric) numeric.set(name, Number.isNaN(values[i]) ? null : values[i]);
    const row = schema.rebuild(times[i], text, numeric);
    Object.freeze(row);
    out.push({ row, seq: seqs[i] });
  }
  return out;
}
