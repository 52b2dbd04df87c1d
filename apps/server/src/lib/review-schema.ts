import type { ReviewCapabilities, ReviewTable } from '../types';

export const CATEGORY_COLUMN = 'PRODUCT';
export const SCORE_COLUMN = 'SENTIMENT_SCORE';

// Decided once per load; downstream steps read the flags instead of probing columns
export function describeReviewSchema(table: Pick<ReviewTable, 'columns'>): ReviewCapabilities {
  return {
    hasCategory: table.columns.includes(CATEGORY_COLUMN),
    hasScore: table.columns.includes(SCORE_COLUMN),
  };
}
