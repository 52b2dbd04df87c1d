import { describe, expect, it, vi } from 'vitest';
import {
  apologize,
  buildChatContext,
  buildChatPrompt,
  ChatService,
  SYSTEM_INSTRUCTION,
} from '../src/lib/chat-service';
import { appendTurn, EMPTY_CONVERSATION } from '../src/lib/conversations';
import { DatabaseError } from '../src/lib/db';
import type { CompletionBridge } from '../src/lib/cortex';
import type { ReviewTable } from '../src/types';

const table: ReviewTable = {
  columns: ['PRODUCT', 'SENTIMENT_SCORE'],
  rows: [
    { PRODUCT: 'Kettle', SENTIMENT_SCORE: 0.4 },
    { PRODUCT: 'Toaster', SENTIMENT_SCORE: -0.1 },
  ],
};

class EchoBridge implements CompletionBridge {
  prompts: string[] = [];

  async complete(_model: string, prompt: string) {
    this.prompts.push(prompt);
    return 'Here is a query.';
  }
}

class FailingBridge implements CompletionBridge {
  async complete(): Promise<string> {
    throw new Error('model unavailable in region');
  }
}

describe('prompt building', () => {
  it('describes the full table by columns and row count', () => {
    expect(buildChatContext(table)).toBe(
      'Table REVIEWS_WITH_SENTIMENT has columns: PRODUCT, SENTIMENT_SCORE. Total rows: 2.'
    );
  });

  it('places the system instruction, context and question in order', () => {
    expect(buildChatPrompt('CTX', 'How many?')).toBe(`${SYSTEM_INSTRUCTION}\n\nContext: CTX\n\nUser: How many?\nAssistant:`);
  });
});

describe('ChatService', () => {
  it('appends the user turn and the reply', async () => {
    const bridge = new EchoBridge();
    const service = new ChatService(bridge);

    const next = await service.submitTurn(EMPTY_CONVERSATION, { model: 'mistral-large2', text: "what's best?", table });

    expect(next).toEqual([
      { role: 'user', text: "what's best?" },
      { role: 'assistant', text: 'Here is a query.' },
    ]);
    expect(bridge.prompts).toEqual([
      buildChatPrompt('Table REVIEWS_WITH_SENTIMENT has columns: PRODUCT, SENTIMENT_SCORE. Total rows: 2.', "what's best?"),
    ]);
  });

  it('turns a failed completion into exactly one apology turn', async () => {
    const service = new ChatService(new FailingBridge());
    const before = appendTurn(EMPTY_CONVERSATION, { role: 'user', text: 'earlier' });

    const next = await service.submitTurn(before, { model: 'snowflake-arctic', text: 'again', table });

    expect(next).toEqual([
      { role: 'user', text: 'earlier' },
      { role: 'user', text: 'again' },
      { role: 'assistant', text: 'Sorry, Cortex call failed: model unavailable in region' },
    ]);
    expect(before).toHaveLength(1);
  });

  it('keeps the order of several turns', async () => {
    const complete = vi.fn<(model: string, prompt: string) => Promise<string>>()
      .mockResolvedValueOnce('b')
      .mockResolvedValueOnce('d');
    const service = new ChatService({ complete });

    const s1 = await service.submitTurn(EMPTY_CONVERSATION, { model: 'mistral-large2', text: 'a', table });
    const s2 = await service.submitTurn(s1, { model: 'mistral-large2', text: 'c', table });

    expect(s2.map(t => `${t.role}:${t.text}`)).toEqual(['user:a', 'assistant:b', 'user:c', 'assistant:d']);
  });
});

describe('apologize', () => {
  it('includes the driver text of a database error', () => {
    const err = new DatabaseError('Database query failed', '100357', undefined, { originalError: 'Unknown model' });
    expect(apologize(err)).toBe('Sorry, Cortex call failed: Database query failed: Unknown model');
  });

  it('handles non-error values', () => {
    expect(apologize('timeout')).toBe('Sorry, Cortex call failed: timeout');
  });
});
