import express, { Request, Response } from 'express';

import { CHART_PERIODS, ChartPeriod } from '../../shared/types';
import { ChartAggregator, periodStart } from '../services/chartAggregator';
import { LibraryStore } from '../services/libraryStore';
import {
  sendError,
  sendErrorFromException,
  sendSuccess,
} from '../utils/apiResponse';
import { createLogger } from '../utils/logger';
import { nowUnixMs } from '../utils/timestamps';
import { isChartPeriod, validateTrackId } from '../utils/validation';

const RECENT_PLAYS_LIMIT = 20;

/**
 * Create chart routes with dependency injection
 */
export default function createChartsRouter(
  charts: ChartAggregator,
  store: LibraryStore
) {
  const router = express.Router();
  const logger = createLogger('ChartsRoutes');

  /**
   * GET /api/v1/charts?period=allTime|week|month|year&record=true
   * Ranked tracks for a chart view, with movement since the last recording.
   */
  router.get('/', async (req: Request, res: Response) => {
    const rawPeriod = req.query.period ?? 'allTime';
    if (!isChartPeriod(rawPeriod)) {
      return sendError(
        res,
        400,
        `period must be one of: ${CHART_PERIODS.join(', ')}`
      );
    }
    const period: ChartPeriod = rawPeriod;

    try {
      const now = nowUnixMs();
      const tracks = await charts.rankedTracks(period, now, {
        record: req.query.record === 'true',
      });
      sendSuccess(res, { period, since: periodStart(period, now), tracks });
    } catch (error) {
      logger.error(`Error computing ${period} chart`, error);
      sendErrorFromException(res, error, 'Failed to compute chart');
    }
  });

  /**
   * GET /api/v1/charts/tracks/:trackId
   * Totals, per-source breakdown and the most recent plays of one track.
   */
  router.get('/tracks/:trackId', async (req: Request, res: Response) => {
    const { trackId } = req.params;
    if (!validateTrackId(trackId)) {
      return sendError(res, 400, 'Invalid track ID format');
    }

    try {
      const track = await store.getTrack(trackId);
      if (!track) {
        return sendError(res, 404, 'Track not found');
      }

      const now = nowUnixMs();
      const periodCounts: Partial<Record<ChartPeriod, number>> = {};
      for (const period of CHART_PERIODS) {
        const since = periodStart(period, now);
        if (since !== null) {
          periodCounts[period] = await charts.periodPlayCount(trackId, since);
        }
      }

      const plays = await store.queryPlays({ trackId });
      sendSuccess(res, {
        track,
        totalPlayCount: await charts.totalPlayCount(trackId),
        periodCounts,
        breakdown: await charts.sourceBreakdown(trackId),
        recentPlays: plays.slice(-RECENT_PLAYS_LIMIT).reverse(),
      });
    } catch (error) {
      logger.error(`Error loading track ${trackId}`, error);
      sendErrorFromException(res, error, 'Failed to load track');
    }
  });

  return router;
}
