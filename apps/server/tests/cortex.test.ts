import { describe, expect, it, vi } from 'vitest';
import { buildCompletionSql, CompletionError, CortexCompletionBridge } from '../src/lib/cortex';
import type { QueryExecutor } from '../src/lib/db';
import type { ReviewTable } from '../src/types';

function executorReturning(table: ReviewTable) {
  const run = vi.fn(async (_sql: string) => table);
  const executor: QueryExecutor = { run };
  return { executor, run };
}

describe('buildCompletionSql', () => {
  it('embeds the model and the escaped prompt in one statement', () => {
    expect(buildCompletionSql('mistral-large2', "Which product's reviews are worst?")).toBe(
      "SELECT SNOWFLAKE.CORTEX.COMPLETE('mistral-large2', 'Which product''s reviews are worst?') AS RESP"
    );
  });
});

describe('CortexCompletionBridge', () => {
  it('returns the first cell of the first row', async () => {
    const { executor, run } = executorReturning({
      columns: ['RESP'],
      rows: [{ RESP: 'Try SELECT PRODUCT FROM REVIEWS_WITH_SENTIMENT' }, { RESP: 'ignored' }],
    });
    const bridge = new CortexCompletionBridge(executor);

    await expect(bridge.complete('llama3-70b', "it's")).resolves.toBe('Try SELECT PRODUCT FROM REVIEWS_WITH_SENTIMENT');
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith("SELECT SNOWFLAKE.CORTEX.COMPLETE('llama3-70b', 'it''s') AS RESP");
  });

  it('fails when the completion returns no row', async () => {
    const { executor } = executorReturning({ columns: ['RESP'], rows: [] });
    await expect(new CortexCompletionBridge(executor).complete('mistral-large2', 'hi')).rejects.toBeInstanceOf(CompletionError);
  });

  it('passes executor failures through untouched', async () => {
    const executor: QueryExecutor = { run: vi.fn(async () => { throw new Error('quota exceeded'); }) };
    await expect(new CortexCompletionBridge(executor).complete('mistral-large2', 'hi')).rejects.toThrow('quota exceeded');
  });
});
