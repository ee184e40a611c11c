import express, { Request, Response } from 'express';

import { CatalogTrack, PlaybackState } from '../../shared/types';
import { BridgedMediaPlayer } from '../services/bridgedMediaPlayer';
import { TrackingEngine } from '../services/trackingEngine';
import { sendError, sendSuccess } from '../utils/apiResponse';
import { createLogger } from '../utils/logger';
import {
  isPlaybackState,
  isRecord,
  parseCatalogTrack,
} from '../utils/validation';

/**
 * Create player bridge routes. The OS integration layer posts playback
 * changes here; they reach the engine as player notifications.
 */
export default function createPlayerRouter(
  player: BridgedMediaPlayer,
  engine: TrackingEngine
) {
  const router = express.Router();
  const logger = createLogger('PlayerRoutes');

  const currentState = () => ({
    nowPlaying: player.nowPlayingItem(),
    state: player.playbackState(),
    session: engine.getSessionSnapshot(),
  });

  /**
   * GET /api/v1/player/now-playing
   */
  router.get('/now-playing', (_req: Request, res: Response) => {
    sendSuccess(res, currentState());
  });

  /**
   * POST /api/v1/player/now-playing
   * Body: { track: CatalogTrack | null, state?: PlaybackState }
   */
  router.post('/now-playing', (req: Request, res: Response) => {
    const body: Record<string, unknown> = isRecord(req.body) ? req.body : {};
    const { track: rawTrack, state: rawState } = body;

    let track: CatalogTrack | null = null;
    if (rawTrack !== null && rawTrack !== undefined) {
      track = parseCatalogTrack(rawTrack);
      if (!track) {
        return sendError(
          res,
          400,
          'track requires id, title, artist and currentPlayCount'
        );
      }
    }

    let state: PlaybackState | undefined;
    if (rawState !== undefined) {
      if (!isPlaybackState(rawState)) {
        return sendError(res, 400, 'Invalid playback state');
      }
      state = rawState;
    }

    logger.debug(`Now playing: ${track ? track.id : 'nothing'}`);
    player.setNowPlaying(track, state);
    sendSuccess(res, currentState());
  });

  /**
   * POST /api/v1/player/state
   * Body: { state: PlaybackState }
   */
  router.post('/state', (req: Request, res: Response) => {
    const state: unknown = isRecord(req.body) ? req.body.state : undefined;
    if (!isPlaybackState(state)) {
      return sendError(res, 400, 'Invalid playback state');
    }

    player.setPlaybackState(state);
    sendSuccess(res, currentState());
  });

  return router;
}
