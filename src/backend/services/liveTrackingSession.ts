import { EventEmitter } from 'events';

import { CatalogTrack } from '../../shared/types';
import { createLogger } from '../utils/logger';
import { elapsedSeconds, nowUnixMs } from '../utils/timestamps';

import { completionRatio, isComplete } from './completionEvaluator';
import { PlaybackEvent } from './playbackSampler';

export interface CompletedListen {
  track: CatalogTrack;
  sessionStartedAt: number;
  completedAt: number;
  listenedSeconds: number;
  trackDurationSeconds: number;
  completionRatio: number;
}

export interface SessionSnapshot {
  state: 'idle' | 'tracking';
  trackId: string | null;
  sessionStartedAt: number | null;
  listenedSeconds: number;
  completionEmitted: boolean;
}

export interface LiveTrackingSessionOptions {
  tickIntervalMs?: number;
  clock?: () => number;
}

interface TrackedListen {
  track: CatalogTrack;
  sessionStartedAt: number;
  /** Start of the currently playing segment; null while paused */
  segmentStartedAt: number | null;
  accumulatedSeconds: number;
  completionEmitted: boolean;
}

/**
 * Accumulates listened time for the current track and decides when the
 * listen counts as a play.
 *
 * State is `tracking` while a segment is open and `idle` otherwise; a paused
 * track is kept so playback can resume into the same session. Each session
 * emits `playCompleted` at most once, from the periodic tick or on finalize.
 */
export class LiveTrackingSession extends EventEmitter {
  private logger = createLogger('LiveTrackingSession');
  private readonly tickIntervalMs: number;
  private readonly clock: () => number;
  private current: TrackedListen | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: LiveTrackingSessionOptions = {}) {
    super();
    this.tickIntervalMs = options.tickIntervalMs ?? 1000;
    this.clock = options.clock ?? nowUnixMs;
  }

  get state(): 'idle' | 'tracking' {
    return this.current?.segmentStartedAt != null ? 'tracking' : 'idle';
  }

  getSnapshot(): SessionSnapshot {
    const current = this.current;
    return {
      state: this.state,
      trackId: current?.track.id ?? null,
      sessionStartedAt: current?.sessionStartedAt ?? null,
      listenedSeconds: current ? this.listenedSoFar(current) : 0,
      completionEmitted: current?.completionEmitted ?? false,
    };
  }

  handleEvent(event: PlaybackEvent): void {
    switch (event.type) {
      case 'trackChanged':
        this.finalize();
        if (event.track && event.isPlaying) {
          this.begin(event.track);
        }
        break;
      case 'playbackStarted':
        this.resume(event.track);
        break;
      case 'playbackPaused':
      case 'playbackStopped':
      case 'playbackInterrupted':
        this.pause();
        break;
    }
  }

  /**
   * Periodic check while tracking; emits as soon as the provisional listened
   * time crosses the completion threshold.
   */
  tick(): void {
    const current = this.current;
    if (!current || current.segmentStartedAt === null) {
      return;
    }
    if (current.completionEmitted) {
      return;
    }

    const provisional = this.listenedSoFar(current);
    if (isComplete(provisional, current.track.durationSeconds)) {
      this.emitCompletion(current, provisional);
    }
  }

  /**
   * Close the session: fold the open segment, emit if the listen qualifies
   * and has not been emitted yet, then forget the track.
   */
  finalize(): void {
    const current = this.current;
    if (!current) {
      return;
    }

    this.closeSegment(current);
    this.stopTimer();

    if (
      !current.completionEmitted &&
      isComplete(current.accumulatedSeconds, current.track.durationSeconds)
    ) {
      this.emitCompletion(current, current.accumulatedSeconds);
    }

    this.logger.debug(
      `Finalized ${current.track.id} after ${current.accumulatedSeconds.toFixed(1)}s`
    );
    this.current = null;
  }

  private begin(track: CatalogTrack): void {
    const now = this.clock();
    this.current = {
      track,
      sessionStartedAt: now,
      segmentStartedAt: now,
      accumulatedSeconds: 0,
      completionEmitted: false,
    };
    if (track.durationSeconds <= 0) {
      this.logger.debug(
        `Tracking ${track.id} without a known duration; it cannot complete`
      );
    } else {
      this.logger.debug(`Tracking ${track.id}`);
    }
    this.startTimer();
  }

  private resume(track: CatalogTrack): void {
    const current = this.current;
    if (current && current.track.id !== track.id) {
      this.finalize();
      this.begin(track);
      return;
    }
    if (!current) {
      this.begin(track);
      return;
    }
    if (current.segmentStartedAt !== null) {
      return;
    }

    current.segmentStartedAt = this.clock();
    this.logger.debug(`Resumed ${track.id}`);
    this.startTimer();
  }

  private pause(): void {
    const current = this.current;
    if (!current || current.segmentStartedAt === null) {
      return;
    }
    this.closeSegment(current);
    this.stopTimer();
    this.logger.debug(
      `Paused ${current.track.id} at ${current.accumulatedSeconds.toFixed(1)}s`
    );
  }

  private closeSegment(current: TrackedListen): void {
    if (current.segmentStartedAt === null) {
      return;
    }
    current.accumulatedSeconds += elapsedSeconds(
      current.segmentStartedAt,
      this.clock()
    );
    current.segmentStartedAt = null;
  }

  private listenedSoFar(current: TrackedListen): number {
    if (current.segmentStartedAt === null) {
      return current.accumulatedSeconds;
    }
    return (
      current.accumulatedSeconds +
      elapsedSeconds(current.segmentStartedAt, this.clock())
    );
  }

  private emitCompletion(current: TrackedListen, listenedSeconds: number): void {
    // Set before notifying: a failed write downstream must not re-arm emission
    current.completionEmitted = true;

    const duration = current.track.durationSeconds;
    const listen: CompletedListen = {
      track: current.track,
      sessionStartedAt: current.sessionStartedAt,
      completedAt: this.clock(),
      listenedSeconds,
      trackDurationSeconds: duration,
      completionRatio: completionRatio(listenedSeconds, duration),
    };

    this.logger.info(
      `Play completed: ${current.track.title} (${Math.round(listen.completionRatio * 100)}%)`
    );

    try {
      this.emit('playCompleted', listen);
    } catch (error) {
      this.logger.error('playCompleted listener failed', error);
    }
  }

  private startTimer(): void {
    this.stopTimer();
    this.timer = setInterval(() => this.tick(), this.tickIntervalMs);
    this.timer.unref?.();
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
