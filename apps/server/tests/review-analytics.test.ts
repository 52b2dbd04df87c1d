import { describe, expect, it } from 'vitest';
import {
  ALL_PRODUCTS,
  binCount,
  categoryOptions,
  filterByCategory,
  meanByCategory,
  roundEdge,
  scoreHistogram,
} from '../src/lib/review-analytics';
import type { ReviewRow } from '../src/types';

const both = { hasCategory: true, hasScore: true };

function scores(values: Array<number | string | null>): ReviewRow[] {
  return values.map(v => ({ SENTIMENT_SCORE: v }));
}

describe('meanByCategory', () => {
  it('averages valid scores per product and sorts ascending', () => {
    const rows: ReviewRow[] = [
      { PRODUCT: 'Kettle', SENTIMENT_SCORE: '0.5' },
      { PRODUCT: 'Kettle', SENTIMENT_SCORE: 'oops' },
      { PRODUCT: 'Kettle', SENTIMENT_SCORE: 0.25 },
      { PRODUCT: 'Toaster', SENTIMENT_SCORE: -0.2 },
      { PRODUCT: 'Blender', SENTIMENT_SCORE: 'bad' },
      { PRODUCT: null, SENTIMENT_SCORE: 0.9 },
      { PRODUCT: 'Mixer', SENTIMENT_SCORE: 0.1 },
    ];
    expect(meanByCategory(rows, both)).toEqual({
      status: 'ok',
      points: [
        { label: 'Toaster', value: -0.2 },
        { label: 'Mixer', value: 0.1 },
        { label: 'Kettle', value: 0.375 },
      ],
    });
  });

  it('leaves radix-prefixed score text out of the mean', () => {
    const rows: ReviewRow[] = [
      { PRODUCT: 'Kettle', SENTIMENT_SCORE: 0.5 },
      { PRODUCT: 'Kettle', SENTIMENT_SCORE: '0x10' },
      { PRODUCT: 'Kettle', SENTIMENT_SCORE: '0b1' },
    ];
    expect(meanByCategory(rows, both)).toEqual({ status: 'ok', points: [{ label: 'Kettle', value: 0.5 }] });
  });

  it('keeps name order for equal means', () => {
    const rows: ReviewRow[] = [
      { PRODUCT: 'b', SENTIMENT_SCORE: 1 },
      { PRODUCT: 'a', SENTIMENT_SCORE: 1 },
    ];
    const result = meanByCategory(rows, both);
    expect(result.status === 'ok' && result.points.map(p => p.label)).toEqual(['a', 'b']);
  });

  it('groups non-string products by their text', () => {
    const result = meanByCategory([{ PRODUCT: 7, SENTIMENT_SCORE: 1 }], both);
    expect(result).toEqual({ status: 'ok', points: [{ label: '7', value: 1 }] });
  });

  it('reports missing columns instead of throwing', () => {
    const rows: ReviewRow[] = [{ PRODUCT: 'Kettle' }];
    expect(meanByCategory(rows, { hasCategory: true, hasScore: false })).toEqual({ status: 'missing-columns' });
    expect(meanByCategory(rows, { hasCategory: false, hasScore: true })).toEqual({ status: 'missing-columns' });
  });

  it('reports empty when no score is numeric', () => {
    const rows: ReviewRow[] = [
      { PRODUCT: 'Kettle', SENTIMENT_SCORE: 'n/a' },
      { PRODUCT: 'Toaster', SENTIMENT_SCORE: null },
    ];
    expect(meanByCategory(rows, both)).toEqual({ status: 'empty' });
  });
});

describe('categoryOptions and filterByCategory', () => {
  const rows: ReviewRow[] = [
    { PRODUCT: 'Kettle', ID: 1 },
    { PRODUCT: 'kettle', ID: 2 },
    { PRODUCT: 'Toaster', ID: 3 },
    { PRODUCT: null, ID: 4 },
    { PRODUCT: 'Kettle', ID: 5 },
    { PRODUCT: 'Kettle ', ID: 6 },
  ];

  it('lists the sentinel first, then sorted distinct products', () => {
    expect(categoryOptions(rows, both)).toEqual([ALL_PRODUCTS, 'Kettle', 'Kettle ', 'Toaster', 'kettle']);
  });

  it('offers only the sentinel without a product column', () => {
    expect(categoryOptions(rows, { hasCategory: false, hasScore: true })).toEqual([ALL_PRODUCTS]);
  });

  it('returns the unfiltered rows for the sentinel', () => {
    expect(filterByCategory(rows, ALL_PRODUCTS, both)).toBe(rows);
  });

  it('matches the product exactly and case-sensitively', () => {
    expect(filterByCategory(rows, 'Kettle', both).map(r => r.ID)).toEqual([1, 5]);
    expect(filterByCategory(rows, 'kettle', both).map(r => r.ID)).toEqual([2]);
    expect(filterByCategory(rows, 'Blender', both)).toEqual([]);
  });

  it('ignores the selection when there is no product column', () => {
    expect(filterByCategory(rows, 'Kettle', { hasCategory: false, hasScore: true })).toBe(rows);
  });
});

describe('binCount', () => {
  it.each([
    [1, 5],
    [24, 5],
    [25, 5],
    [26, 5],
    [42, 6],
    [44, 7],
    [1600, 40],
    [1601, 40],
    [10000, 40],
  ])('n=%i gives %i bins', (n, expected) => {
    expect(binCount(n)).toBe(expected);
  });
});

describe('roundEdge', () => {
  it('rounds the fractional part to three significant digits', () => {
    expect(roundEdge(12.34567)).toBe(12.346);
    expect(roundEdge(0.123456)).toBe(0.123);
    expect(roundEdge(-0.009)).toBe(-0.009);
    expect(roundEdge(9)).toBe(9);
  });
});

describe('scoreHistogram', () => {
  it('splits the range into equal right-closed bins', () => {
    const rows = scores([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 'x', null]);
    const result = scoreHistogram(rows, both);
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.bins.map(b => b.label)).toEqual([
      '(-0.009, 1.8]',
      '(1.8, 3.6]',
      '(3.6, 5.4]',
      '(5.4, 7.2]',
      '(7.2, 9]',
    ]);
    expect(result.bins.map(b => b.count)).toEqual([2, 2, 2, 2, 2]);
  });

  it('keeps empty bins and widens a zero range', () => {
    const result = scoreHistogram(scores([2, 2, '2']), both);
    expect(result.status === 'ok' && result.bins.map(b => b.count)).toEqual([0, 0, 3, 0, 0]);
  });

  it.each([1, 24, 25, 26, 1600, 1601, 10000])('uses the clamped bin count for %i samples', n => {
    const result = scoreHistogram(scores(Array.from({ length: n }, (_, i) => i)), both);
    expect(result.status === 'ok' && result.bins.length).toBe(binCount(n));
    expect(result.status === 'ok' && result.bins.reduce((sum, b) => sum + b.count, 0)).toBe(n);
  });

  it('excludes non-numeric scores from the counts', () => {
    const result = scoreHistogram(scores([1, 'one', 2, '', '3', '0x10', '0b1']), both);
    expect(result.status === 'ok' && result.bins.reduce((sum, b) => sum + b.count, 0)).toBe(3);
  });

  it('reports a missing column and an empty sample separately', () => {
    expect(scoreHistogram(scores([1]), { hasCategory: true, hasScore: false })).toEqual({ status: 'missing-column' });
    expect(scoreHistogram(scores(['a', null]), both)).toEqual({ status: 'empty' });
  });
});
