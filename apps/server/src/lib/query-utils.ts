import type { CellValue, ReviewRow, ReviewTable } from '../types';

// Utility functions for query processing and safe serialization

export function normalizeValue(v: unknown): CellValue {
  if (v == null) return null;
  if (typeof v === 'string' || typeof v === 'boolean') return v;
  if (typeof v === 'number') return Number.isNaN(v) ? null : v;
  if (typeof v === 'bigint') return Number(v);
  if (v instanceof Date) {
    return Number.isNaN(v.getTime()) ? null : v.toISOString();
  }
  if (Buffer.isBuffer(v)) return v.toString('base64');
  if (typeof v === 'object') {
    // Prevent [object Object] rendering by serializing nested structures
    try {
      return JSON.stringify(v);
    } catch {
      return String(v);
    }
  }
  return String(v);
}

export function normalizeRows(rows: unknown[]): ReviewRow[] {
  return rows.map(row => {
    const out: ReviewRow = {};
    if (row && typeof row === 'object') {
      for (const [key, v] of Object.entries(row)) {
        out[key] = normalizeValue(v);
      }
    }
    return out;
  });
}

// Double every single quote so the text can sit inside '...'
export function escapeSqlLiteral(text: string): string {
  return text.replace(/'/g, "''");
}

export function truncateSql(sql: string, max = 100): string {
  return sql.slice(0, max) + (sql.length > max ? '...' : '');
}

/**
 * Numeric coercion where anything unparseable becomes null (missing),
 * never zero. Blank strings are missing too.
 */
// Plain decimal or exponent notation; Number() alone would also take 0x/0b/0o literals
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export function toNumeric(v: CellValue | undefined): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string') {
    const s = v.trim();
    if (!DECIMAL_TEXT.test(s)) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export const DATE_COLUMNS = ['REVIEW_DATE', 'SHIPPING_DATE'];

function toIsoDate(v: CellValue): string | null {
  if (v == null || typeof v === 'boolean') return null;
  if (typeof v === 'string' && !v.trim()) return null;
  const d = new Date(v);
  return Number.isNaN(d.getTime()) ? null : d.toISOString();
}

// Parse the known date columns in place of their raw values; unparseable dates become null
export function coerceDateColumns(table: ReviewTable, columns: string[] = DATE_COLUMNS): ReviewTable {
  const present = columns.filter(c => table.columns.includes(c));
  if (!present.length) return table;
  return {
    columns: table.columns,
    rows: table.rows.map(row => {
      const next: ReviewRow = { ...row };
      for (const c of present) next[c] = toIsoDate(row[c] ?? null);
      return next;
    }),
  };
}
