import { toNumeric } from './query-utils';
import { CATEGORY_COLUMN, SCORE_COLUMN } from './review-schema';
import type { ChartPoint, ReviewCapabilities, ReviewRow } from '../types';

export const ALL_PRODUCTS = 'All Products';

export const MIN_BINS = 5;
export const MAX_BINS = 40;

export type MeanByCategory =
  | { status: 'ok'; points: ChartPoint[] }
  | { status: 'missing-columns' }
  | { status: 'empty' };

export type Histogram =
  | { status: 'ok'; bins: HistogramBin[] }
  | { status: 'missing-column' }
  | { status: 'empty' };

export interface HistogramBin {
  label: string;
  low: number;
  high: number;
  count: number;
}

export function categoryOf(row: ReviewRow): string | null {
  const v = row[CATEGORY_COLUMN];
  if (v == null) return null;
  return typeof v === 'string' ? v : String(v);
}

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function scoresOf(rows: ReviewRow[]): number[] {
  const out: number[] = [];
  for (const row of rows) {
    const n = toNumeric(row[SCORE_COLUMN]);
    if (n !== null) out.push(n);
  }
  return out;
}

export function meanByCategory(rows: ReviewRow[], caps: ReviewCapabilities): MeanByCategory {
  if (!caps.hasCategory || !caps.hasScore) return { status: 'missing-columns' };

  const groups = new Map<string, { sum: number; count: number }>();
  for (const row of rows) {
    const category = categoryOf(row);
    if (category === null) continue;
    const g = groups.get(category) ?? { sum: 0, count: 0 };
    const score = toNumeric(row[SCORE_COLUMN]);
    if (score !== null) {
      g.sum += score;
      g.count += 1;
    }
    groups.set(category, g);
  }

  const points = [...groups.entries()]
    .filter(([, g]) => g.count > 0)
    .sort(([a], [b]) => byCodeUnit(a, b))
    .map(([label, g]) => ({ label, value: g.sum / g.count }))
    // Array#sort is stable, so equal means keep name order
    .sort((a, b) => a.value - b.value);

  return points.length ? { status: 'ok', points } : { status: 'empty' };
}

export function categoryOptions(rows: ReviewRow[], caps: ReviewCapabilities): string[] {
  if (!caps.hasCategory) return [ALL_PRODUCTS];
  const distinct = new Set<string>();
  for (const row of rows) {
    const c = categoryOf(row);
    if (c !== null) distinct.add(c);
  }
  return [ALL_PRODUCTS, ...[...distinct].sort(byCodeUnit)];
}

export function filterByCategory(rows: ReviewRow[], selected: string, caps: ReviewCapabilities): ReviewRow[] {
  if (!caps.hasCategory || selected === ALL_PRODUCTS) return rows;
  return rows.filter(row => categoryOf(row) === selected);
}

export function binCount(sampleCount: number): number {
  return Math.min(MAX_BINS, Math.max(MIN_BINS, Math.round(Math.sqrt(sampleCount))));
}

/**
 * Rounds the fractional part to `precision` significant digits and keeps the
 * integer part, so 12.34567 prints as 12.346 and -0.009 stays -0.009.
 */
export function roundEdge(x: number, precision = 3): number {
  if (!Number.isFinite(x)) return x;
  const frac = x - Math.trunc(x);
  if (frac === 0) return x;
  const digits = -Math.floor(Math.log10(Math.abs(frac))) - 1 + precision;
  return Number(x.toFixed(Math.min(100, Math.max(0, digits))));
}

export function binEdges(values: number[], bins: number): number[] {
  let lo = values[0];
  let hi = values[0];
  for (const v of values) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }
  if (lo === hi) {
    lo -= lo === 0 ? 0.001 : 0.001 * Math.abs(lo);
    hi += hi === 0 ? 0.001 : 0.001 * Math.abs(hi);
    return Array.from({ length: bins + 1 }, (_, i) => lo + ((hi - lo) * i) / bins);
  }
  const span = hi - lo;
  const edges = Array.from({ length: bins + 1 }, (_, i) => lo + (span * i) / bins);
  // Right-closed bins: lower the first edge so the minimum lands in bin 0
  edges[0] = lo - span * 0.001;
  return edges;
}

export function scoreHistogram(rows: ReviewRow[], caps: ReviewCapabilities): Histogram {
  if (!caps.hasScore) return { status: 'missing-column' };
  const values = scoresOf(rows);
  if (!values.length) return { status: 'empty' };

  const bins = binCount(values.length);
  const edges = binEdges(values, bins);
  const counts = new Array<number>(bins).fill(0);
  for (const v of values) {
    let idx = edges.findIndex((edge, i) => i > 0 && v <= edge) - 1;
    // Float drift on the top edge
    if (idx < 0) idx = bins - 1;
    counts[idx] += 1;
  }

  return {
    status: 'ok',
    bins: counts.map((count, i) => {
      const low = edges[i];
      const high = edges[i + 1];
      return { label: `(${roundEdge(low)}, ${roundEdge(high)}]`, low, high, count };
    }),
  };
}
