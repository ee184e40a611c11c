import { EventEmitter } from 'events';

import {
  PlayFact,
  ReconciliationProgress,
  SyncOutcome,
} from '../../shared/types';
import { errorMessage, isPlaytallyError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { nowUnixMs } from '../utils/timestamps';

import { ChartAggregator } from './chartAggregator';
import { CounterReconciler, createTrackRecord } from './counterReconciler';
import { EngineStateStore } from './engineStateStore';
import { LibraryStore } from './libraryStore';
import {
  CompletedListen,
  LiveTrackingSession,
  SessionSnapshot,
} from './liveTrackingSession';
import { PlaybackEvent, PlaybackSampler } from './playbackSampler';
import { ReconciliationLock } from './reconciliationLock';
import { SyncScheduler } from './syncScheduler';

export interface TrackingEngineDeps {
  sampler: PlaybackSampler;
  session: LiveTrackingSession;
  reconciler: CounterReconciler;
  scheduler: SyncScheduler;
  charts: ChartAggregator;
  store: LibraryStore;
  lock: ReconciliationLock;
  stateStore: EngineStateStore;
}

/**
 * Top-level play detection engine.
 *
 * Events:
 * - `playRecorded` (PlayFact) after a live play is committed
 * - `playDropped` (CompletedListen, error message) when committing failed
 * - `seedProgress` (ReconciliationProgress) during the first-launch import
 * - `permissionDenied` when catalog access was refused
 */
export class TrackingEngine extends EventEmitter {
  private deps: TrackingEngineDeps;
  private logger = createLogger('TrackingEngine');
  private started = false;
  private pendingWrites = new Set<Promise<void>>();

  private readonly onPlaybackEvent = (event: PlaybackEvent) =>
    this.deps.session.handleEvent(event);

  private readonly onPlayCompleted = (listen: CompletedListen) => {
    const write: Promise<void> = this.recordLivePlay(listen)
      .then(() => undefined)
      .catch(error => {
        this.logger.error('Live play handling failed', error);
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  };

  constructor(deps: TrackingEngineDeps) {
    super();
    this.deps = deps;
  }

  isStarted(): boolean {
    return this.started;
  }

  /** Start observing the player. */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.deps.session.on('playCompleted', this.onPlayCompleted);
    this.deps.sampler.on('playbackEvent', this.onPlaybackEvent);
    this.deps.sampler.start();
    this.logger.info('Tracking engine started');
  }

  /**
   * Stop observing, finalize the current listen and wait for its write.
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.deps.sampler.stop();
    this.deps.sampler.off('playbackEvent', this.onPlaybackEvent);
    this.deps.session.finalize();
    this.deps.session.off('playCompleted', this.onPlayCompleted);
    this.started = false;

    await this.whenIdle();
    this.logger.info('Tracking engine stopped');
  }

  /** Resolves once every live play write in flight has settled. */
  async whenIdle(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all([...this.pendingWrites]);
    }
  }

  getSessionSnapshot(): SessionSnapshot {
    return this.deps.session.getSnapshot();
  }

  /**
   * Launch/foreground hook: seeds the library on first launch, otherwise
   * applies the full-or-quick sync policy.
   */
  async activate(now: number = nowUnixMs()): Promise<SyncOutcome> {
    try {
      const state = await this.deps.stateStore.get();
      if (!state.hasSeededLibrary) {
        return await this.seedLibrary(now);
      }
      return await this.deps.scheduler.onAppActivated(now);
    } catch (error) {
      if (isPlaytallyError(error) && error.code === 'PERMISSION_DENIED') {
        this.logger.warn('Media library access denied');
        this.emit('permissionDenied', error);
      }
      throw error;
    }
  }

  /**
   * First-launch import: every catalog track gets its current counter as
   * baseline and no play facts.
   */
  async seedLibrary(now: number): Promise<SyncOutcome> {
    this.logger.info('Seeding library from catalog');
    const forward = (progress: ReconciliationProgress) =>
      this.emit('seedProgress', progress);

    this.deps.reconciler.on('progress', forward);
    try {
      const outcome = await this.deps.scheduler.runFullSync(now);
      await this.deps.stateStore.update({ hasSeededLibrary: true });
      this.logger.info(
        `Library seeded with ${outcome.report?.tracksCreated ?? 0} tracks`
      );
      return outcome;
    } finally {
      this.deps.reconciler.off('progress', forward);
    }
  }

  /**
   * Persist a completed live listen. The track's accounted-for counter moves
   * by one in the same commit, held as a pending credit until the system
   * counter shows the play, so no sync counts it again.
   */
  async recordLivePlay(listen: CompletedListen): Promise<PlayFact | null> {
    const { track } = listen;
    const now = listen.completedAt;

    let fact: PlayFact;
    try {
      fact = await this.deps.lock.withTrack(track.id, () =>
        this.deps.store.transaction(tx => {
          const existing = tx.getTrack(track.id);
          const record = existing ?? createTrackRecord(track, now);
          if (!existing) {
            tx.upsertTrack(record);
          }

          const inserted = tx.insertPlay({
            trackId: track.id,
            timestamp: now,
            source: 'live',
            listenedSeconds: listen.listenedSeconds,
            trackDurationSeconds: listen.trackDurationSeconds,
            completionRatio: listen.completionRatio,
          });
          // Credited until the system counter shows the play
          tx.upsertTrack({
            ...record,
            lastSeenCounter: record.lastSeenCounter + 1,
            pendingLiveCredits: record.pendingLiveCredits + 1,
            lastLivePlayAt: now,
          });
          return inserted;
        })
      );
    } catch (error) {
      this.logger.warn(`Dropped live play for ${track.title}`, error);
      this.emit('playDropped', listen, errorMessage(error));
      return null;
    }

    this.logger.info(`Recorded live play for ${track.title}`);
    this.emit('playRecorded', fact);

    try {
      await this.deps.charts.rankedTracks('allTime', now, { record: true });
    } catch (error) {
      this.logger.error('Failed to update charts after live play', error);
    }
    return fact;
  }
}
