import { escapeSqlLiteral } from './query-utils';
import type { QueryExecutor } from './db';

export const CORTEX_MODELS = ['mistral-large2', 'snowflake-arctic', 'llama3-70b'] as const;
export type CortexModel = (typeof CORTEX_MODELS)[number];
export const DEFAULT_MODEL: CortexModel = 'mistral-large2';

export class CompletionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CompletionError';
  }
}

export interface CompletionBridge {
  complete(model: string, prompt: string): Promise<string>;
}

// The model name is embedded as-is; callers only pass values from CORTEX_MODELS
export function buildCompletionSql(model: string, prompt: string): string {
  return `SELECT SNOWFLAKE.CORTEX.COMPLETE('${model}', '${escapeSqlLiteral(prompt)}') AS RESP`;
}

export class CortexCompletionBridge implements CompletionBridge {
  constructor(private readonly executor: QueryExecutor) {}

  async complete(model: string, prompt: string): Promise<string> {
    const { columns, rows } = await this.executor.run(buildCompletionSql(model, prompt));
    const first = rows[0];
    if (!first) throw new CompletionError('Completion returned no rows');
    const key = columns[0] ?? Object.keys(first)[0];
    const value = key === undefined ? null : first[key];
    return value == null ? '' : String(value);
  }
}
