import { Router } from 'express';
import { z } from 'zod';
import { REVIEWS_TABLE } from '../lib/config';
import { DatabaseError, type QueryExecutor } from '../lib/db';
import { coerceDateColumns } from '../lib/query-utils';
import { buildReviewsPage } from '../lib/review-page';
import { ALL_PRODUCTS } from '../lib/review-analytics';
import type { ReviewTable } from '../types';

export const SELECT_REVIEWS = `SELECT * FROM ${REVIEWS_TABLE}`;

export async function loadReviews(executor: QueryExecutor): Promise<ReviewTable> {
  return coerceDateColumns(await executor.run(SELECT_REVIEWS));
}

const querySchema = z.object({
  product: z.string().min(1).default(ALL_PRODUCTS),
});

export function createReviewsRouter(executor: QueryExecutor): Router {
  const router = Router();

  // Every product change reloads the table and recomputes the page
  router.get('/', async (req, res) => {
    const parsed = querySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: 'Invalid reviews request', issues: parsed.error.issues });

    try {
      const table = await loadReviews(executor);
      res.json(buildReviewsPage(table, parsed.data.product));
    } catch (err: unknown) {
      const code = err instanceof DatabaseError ? err.code ?? 'UNKNOWN' : 'UNKNOWN';
      const details = err instanceof DatabaseError ? err.details : undefined;
      const message = err instanceof Error ? err.message : 'Failed to load reviews';
      res.status(500).json({ error: message, code, details });
    }
  });

  return router;
}
