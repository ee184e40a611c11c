import express, { Request, Response } from 'express';

import { MaintenanceService } from '../services/maintenanceService';
import { sendErrorFromException, sendSuccess } from '../utils/apiResponse';
import { createLogger } from '../utils/logger';
import { nowUnixMs } from '../utils/timestamps';

/**
 * Create maintenance routes with dependency injection
 */
export default function createMaintenanceRouter(
  maintenanceService: MaintenanceService
) {
  const router = express.Router();
  const logger = createLogger('MaintenanceRoutes');

  /**
   * POST /api/v1/maintenance
   * Prune expired play facts and drop orphaned tracks.
   */
  router.post('/', async (_req: Request, res: Response) => {
    try {
      const report = await maintenanceService.performMaintenance(nowUnixMs());
      sendSuccess(res, report);
    } catch (error) {
      logger.error('Maintenance failed', error);
      sendErrorFromException(res, error, 'Maintenance failed');
    }
  });

  /**
   * DELETE /api/v1/maintenance/data
   * Delete all tracks and plays and return to first-launch state.
   */
  router.delete('/data', async (_req: Request, res: Response) => {
    try {
      const report = await maintenanceService.resetAll();
      sendSuccess(res, report);
    } catch (error) {
      logger.error('Deleting all data failed', error);
      sendErrorFromException(res, error, 'Deleting all data failed');
    }
  });

  return router;
}
