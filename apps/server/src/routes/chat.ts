import { Router } from 'express';
import { z } from 'zod';
import { DatabaseError, type QueryExecutor } from '../lib/db';
import { CORTEX_MODELS, DEFAULT_MODEL } from '../lib/cortex';
import type { ChatService } from '../lib/chat-service';
import type { ConversationStore } from '../lib/conversations';
import { logValidationFailure } from '../lib/logger';
import { loadReviews } from './reviews';

const historySchema = z.object({
  sessionId: z.string().trim().min(1),
});

const sendSchema = z.object({
  sessionId: z.string().trim().min(1),
  // Only the three offered models get through; the bridge itself accepts any string
  model: z.enum(CORTEX_MODELS).default(DEFAULT_MODEL),
  message: z.string().refine(s => s.trim().length > 0, 'message must not be blank'),
});

export type ChatRouterDeps = {
  executor: QueryExecutor;
  chat: ChatService;
  conversations: ConversationStore;
};

export function createChatRouter({ executor, chat, conversations }: ChatRouterDeps): Router {
  const router = Router();

  router.get('/models', (_req, res) => {
    res.json({ models: CORTEX_MODELS, defaultModel: DEFAULT_MODEL });
  });

  router.get('/history', (req, res) => {
    const parsed = historySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: 'sessionId is required', issues: parsed.error.issues });
    const { sessionId } = parsed.data;
    res.json({ sessionId, turns: conversations.get(sessionId) });
  });

  router.post('/send', async (req, res) => {
    const parsed = sendSchema.safeParse(req.body);
    if (!parsed.success) {
      logValidationFailure('Rejected chat request', parsed.error.issues, { route: 'chat.send' });
      return res.status(400).json({ error: 'Invalid chat request', issues: parsed.error.issues });
    }
    const { sessionId, model, message } = parsed.data;

    try {
      // The page reload that precedes a chat turn; its failure is not a chat failure
      const table = await loadReviews(executor);
      const next = await chat.submitTurn(conversations.get(sessionId), { model, text: message, table });
      conversations.set(sessionId, next);
      res.json({ sessionId, turns: next });
    } catch (err: unknown) {
      const code = err instanceof DatabaseError ? err.code ?? 'UNKNOWN' : 'UNKNOWN';
      const details = err instanceof DatabaseError ? err.details : undefined;
      const msg = err instanceof Error ? err.message : 'Failed to send message';
      res.status(500).json({ error: msg, code, details });
    }
  });

  return router;
}
