import { REVIEWS_TABLE } from './config';
import { appendTurn } from './conversations';
import { DatabaseError } from './db';
import { logEvent, logQueryError } from './logger';
import type { CompletionBridge } from './cortex';
import type { ConversationState, ReviewTable } from '../types';

export const SYSTEM_INSTRUCTION =
  'You are a helpful Snowflake data assistant. ' +
  'When asked for metrics, provide a concise Snowflake SQL the user could run. ' +
  `Use the table name ${REVIEWS_TABLE} and existing column names.`;

export type ChatTurnInput = {
  model: string;
  text: string;
  // Full, unfiltered table; the filtered view never reaches the prompt
  table: ReviewTable;
};

// Column names and row count only, to keep the prompt short
export function buildChatContext(table: ReviewTable): string {
  return `Table ${REVIEWS_TABLE} has columns: ${table.columns.join(', ')}. Total rows: ${table.rows.length}.`;
}

export function buildChatPrompt(context: string, text: string): string {
  return `${SYSTEM_INSTRUCTION}\n\nContext: ${context}\n\nUser: ${text}\nAssistant:`;
}

export function errorDetail(err: unknown): string {
  if (err instanceof DatabaseError) {
    const original = err.details?.originalError;
    return typeof original === 'string' && original !== err.message ? `${err.message}: ${original}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

export function apologize(err: unknown): string {
  return `Sorry, Cortex call failed: ${errorDetail(err)}`;
}

export class ChatService {
  constructor(private readonly bridge: CompletionBridge) {}

  /**
   * Appends the user turn, waits for the completion and appends exactly one
   * assistant turn. Completion failures become the assistant's reply.
   */
  async submitTurn(state: ConversationState, input: ChatTurnInput): Promise<ConversationState> {
    const submitted = appendTurn(state, { role: 'user', text: input.text });
    const prompt = buildChatPrompt(buildChatContext(input.table), input.text);
    const startedAt = Date.now();

    let reply: string;
    try {
      reply = await this.bridge.complete(input.model, prompt);
      logEvent('Completion finished', { model: input.model, elapsedMs: Date.now() - startedAt, replyChars: reply.length });
    } catch (err: unknown) {
      logQueryError('Completion failed', err, { model: input.model, promptChars: prompt.length });
      reply = apologize(err);
    }

    return appendTurn(submitted, { role: 'assistant', text: reply });
  }
}
