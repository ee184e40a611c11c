import express, { Request, Response } from 'express';

import { SyncScheduler } from '../services/syncScheduler';
import { TrackingEngine } from '../services/trackingEngine';
import { sendErrorFromException, sendSuccess } from '../utils/apiResponse';
import { createLogger } from '../utils/logger';

/**
 * Create sync routes with dependency injection
 */
export default function createSyncRouter(
  engine: TrackingEngine,
  scheduler: SyncScheduler
) {
  const router = express.Router();
  const logger = createLogger('SyncRoutes');

  /**
   * POST /api/v1/sync/activate
   * Launch/foreground hook. Seeds on first launch, then full or quick sync.
   */
  router.post('/activate', async (_req: Request, res: Response) => {
    try {
      const outcome = await engine.activate();
      sendSuccess(res, outcome);
    } catch (error) {
      logger.error('Activation sync failed', error);
      sendErrorFromException(res, error, 'Sync failed');
    }
  });

  /**
   * GET /api/v1/sync/status
   */
  router.get('/status', (_req: Request, res: Response) => {
    sendSuccess(res, {
      ...scheduler.getSyncStatus(),
      session: engine.getSessionSnapshot(),
    });
  });

  return router;
}
