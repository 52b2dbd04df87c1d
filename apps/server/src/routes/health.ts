import { Router } from 'express';
import type { SessionStatus } from '../lib/db';

export function createHealthRouter(session: SessionStatus): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ ok: true });
  });

  // Reports the session without issuing SQL
  router.get('/db', async (_req, res) => {
    const connected = await session.isConnected();
    res.json({ ok: connected, provider: session.sessionKind, connected });
  });

  return router;
}
