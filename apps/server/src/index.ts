import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import { loadServerConfig } from './lib/config';
import { SnowflakeQueryExecutor } from './lib/db';
import { selectSessionProvider, type SessionProvider, type WarehouseConnection } from './lib/session-provider';
import { CortexCompletionBridge } from './lib/cortex';
import { ChatService } from './lib/chat-service';
import { ConversationStore } from './lib/conversations';
import { logEvent, logQueryError } from './lib/logger';
import { createReviewsRouter } from './routes/reviews';
import { createChatRouter } from './routes/chat';
import { createHealthRouter } from './routes/health';

const config = loadServerConfig();

function unavailableProvider(reason: unknown): SessionProvider {
  const message = reason instanceof Error ? reason.message : String(reason);
  return {
    kind: 'credentials',
    connect: (): Promise<WarehouseConnection> => Promise.reject(new Error(`Warehouse session unavailable: ${message}`)),
  };
}

let sessions: SessionProvider;
try {
  sessions = selectSessionProvider(config.tokenPath);
} catch (err) {
  logQueryError('Failed to build warehouse session provider', err);
  if (!config.allowNoDb) {
    process.exit(1);
  }
  console.warn('ALLOW_NO_DB=true; starting server without database connectivity.');
  sessions = unavailableProvider(err);
}

const executor = new SnowflakeQueryExecutor(sessions);
const chat = new ChatService(new CortexCompletionBridge(executor));
const conversations = new ConversationStore({ idleMs: config.sessionIdleMs, maxSessions: config.maxSessions });

const app = express();

app.use(cors({ origin: config.webOrigin }));
app.use(express.json({ limit: '1mb' }));

app.use('/health', createHealthRouter(executor));

app.use('/api/reviews', createReviewsRouter(executor));
app.use('/api/chat', createChatRouter({ executor, chat, conversations }));

// Error handler fallback
app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  const status = err && typeof err === 'object' && 'status' in err && typeof err.status === 'number' ? err.status : 500;
  const msg = err instanceof Error ? err.message : 'Internal Server Error';
  logQueryError('API error', err, { status });
  res.status(status).json({ error: msg });
});

app.listen(config.port, () => {
  console.log(`[review-insights] API listening on http://localhost:${config.port} (provider=${sessions.kind})`);
});

const shutdown = async (signal: string) => {
  logEvent(`${signal} received. Closing warehouse session...`);
  try {
    await executor.close();
  } catch (err) {
    logQueryError('Failed to close warehouse session', err);
  }
  process.exit(0);
};

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
