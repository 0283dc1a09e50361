import { Router } from 'express';

const getVersion = (): string => process.env.GIT_SHA || 'dev';

/**
 * Liveness probe. `activeRounds` reports rounds held in memory right now.
 */
export function createHealthRouter(getActiveRounds: () => number): Router {
  const healthRouter = Router();

  healthRouter.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  healthRouter.get('/healthz', (_req, res) => {
    res.status(200).json({
      ok: true,
      ts: new Date().toISOString(),
      version: getVersion(),
      activeRounds: getActiveRounds(),
    });
  });

  return healthRouter;
}
