import { REVIEWS_TABLE } from './config';
import { describeReviewSchema } from './review-schema';
import {
  ALL_PRODUCTS,
  categoryOptions,
  filterByCategory,
  meanByCategory,
  scoreHistogram,
} from './review-analytics';
import type { ChartPanel, ReviewsPage, ReviewTable } from '../types';

export const MEAN_TITLE = 'Average Sentiment by Product';

export function formatCaption(rowCount: number): string {
  return `Loaded ${rowCount.toLocaleString('en-US')} rows from ${REVIEWS_TABLE}`;
}

/**
 * One top-to-bottom pass over a freshly loaded table: the three derivations
 * plus the titles and notices the page shows in place of empty charts.
 */
export function buildReviewsPage(table: ReviewTable, product: string = ALL_PRODUCTS): ReviewsPage {
  const caps = describeReviewSchema(table);
  const selectedProduct = caps.hasCategory ? product : ALL_PRODUCTS;

  const mean = meanByCategory(table.rows, caps);
  let meanByProduct: ChartPanel;
  if (mean.status === 'ok') {
    meanByProduct = { kind: 'chart', title: MEAN_TITLE, points: mean.points };
  } else if (mean.status === 'empty') {
    meanByProduct = { kind: 'notice', title: MEAN_TITLE, notice: { level: 'info', message: 'No sentiment scores to aggregate.' } };
  } else {
    meanByProduct = {
      kind: 'notice',
      title: MEAN_TITLE,
      notice: { level: 'info', message: 'Need columns PRODUCT and SENTIMENT_SCORE for this chart.' },
    };
  }

  const filtered = filterByCategory(table.rows, selectedProduct, caps);

  const histTitle = `Sentiment Score Distribution (${selectedProduct})`;
  const hist = scoreHistogram(filtered, caps);
  let histogram: ChartPanel;
  if (hist.status === 'ok') {
    histogram = { kind: 'chart', title: histTitle, points: hist.bins.map(b => ({ label: b.label, value: b.count })) };
  } else if (hist.status === 'empty') {
    histogram = { kind: 'notice', title: histTitle, notice: { level: 'info', message: 'No numeric SENTIMENT_SCORE values to plot.' } };
  } else {
    histogram = { kind: 'notice', title: histTitle, notice: { level: 'info', message: 'SENTIMENT_SCORE column not found.' } };
  }

  return {
    caption: formatCaption(table.rows.length),
    rowCount: table.rows.length,
    columns: table.columns,
    productOptions: categoryOptions(table.rows, caps),
    selectedProduct,
    filterWarning: caps.hasCategory ? undefined : { level: 'warning', message: 'PRODUCT column not found; showing all rows.' },
    meanByProduct,
    reviews: { title: `Reviews for ${selectedProduct}`, columns: table.columns, rows: filtered },
    histogram,
  };
}
