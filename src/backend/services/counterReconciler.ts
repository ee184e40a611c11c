import { EventEmitter } from 'events';

import {
  CatalogTrack,
  NewPlayFact,
  ReconciliationProgress,
  ReconciliationReport,
  TrackReconciliation,
  TrackRecord,
} from '../../shared/types';
import { CatalogUnavailableError, isPlaytallyError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { DAY_MS, SECOND_MS, nowUnixMs } from '../utils/timestamps';

import { CatalogAccessor } from './catalogAccessor';
import { LibraryStore, LibraryTransaction } from './libraryStore';
import { ReconciliationLock } from './reconciliationLock';

export const DEFAULT_BATCH_SIZE = 100;

/**
 * A live play the system counter has not shown after this long was skipped
 * before the end of the track; the system will never count it.
 */
export const PENDING_LIVE_CREDIT_TTL_MS = DAY_MS;

export interface CounterReconcilerOptions {
  batchSize?: number;
  /** Uniform random source in [0, 1); injectable for tests */
  random?: () => number;
  /** Wall clock for the progress estimate */
  clock?: () => number;
}

/**
 * New track record for a catalog entry seen for the first time. Plays the
 * system already counted become the baseline; no play facts are created.
 */
export function createTrackRecord(
  catalogTrack: CatalogTrack,
  now: number,
  catalogOrder?: number
): TrackRecord {
  return {
    id: catalogTrack.id,
    title: catalogTrack.title,
    artist: catalogTrack.artist,
    album: catalogTrack.album,
    durationSeconds: catalogTrack.durationSeconds,
    baselineCounter: catalogTrack.currentPlayCount,
    lastSeenCounter: catalogTrack.currentPlayCount,
    pendingLiveCredits: 0,
    lastReconciledAt: now,
    catalogOrder,
    createdAt: now,
  };
}

const yieldToEventLoop = () =>
  new Promise<void>(resolve => setImmediate(resolve));

/**
 * Compares system play counters with the values already accounted for and
 * turns the difference into `counterSync` play facts.
 *
 * Emits `progress` ({@link ReconciliationProgress}) after each committed batch.
 */
export class CounterReconciler extends EventEmitter {
  private catalog: CatalogAccessor;
  private store: LibraryStore;
  private lock: ReconciliationLock;
  private batchSize: number;
  private random: () => number;
  private clock: () => number;
  private logger = createLogger('CounterReconciler');

  constructor(
    catalog: CatalogAccessor,
    store: LibraryStore,
    lock: ReconciliationLock,
    options: CounterReconcilerOptions = {}
  ) {
    super();
    this.catalog = catalog;
    this.store = store;
    this.lock = lock;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? nowUnixMs;
  }

  /**
   * Reconcile every catalog track. Each batch is committed on its own; if a
   * batch fails the error propagates and earlier batches stay committed.
   */
  async reconcileAll(now: number): Promise<ReconciliationReport> {
    const catalogTracks = await this.enumerateCatalog();
    this.logger.info(
      `Starting full reconciliation of ${catalogTracks.length} tracks`
    );

    const report: ReconciliationReport = {
      tracksProcessed: 0,
      tracksCreated: 0,
      playsCreated: 0,
      countersReset: 0,
      batchesCommitted: 0,
      startedAt: now,
      completedAt: now,
    };
    const clockStart = this.clock();

    for (let start = 0; start < catalogTracks.length; start += this.batchSize) {
      const batch = catalogTracks.slice(start, start + this.batchSize);

      const results = await this.lock.withTracks(
        batch.map(track => track.id),
        () =>
          this.store.transaction(tx =>
            batch.map((track, offset) =>
              this.reconcileInTransaction(tx, track, now, start + offset)
            )
          )
      );

      for (const result of results) {
        report.tracksProcessed++;
        if (result.created) report.tracksCreated++;
        if (result.counterReset) report.countersReset++;
        report.playsCreated += result.playsCreated;
      }
      report.batchesCommitted++;

      const progress: ReconciliationProgress = {
        processed: report.tracksProcessed,
        total: catalogTracks.length,
        currentTitle: batch[batch.length - 1]?.title,
        estimatedSecondsRemaining: this.estimateRemaining(
          clockStart,
          report.tracksProcessed,
          catalogTracks.length
        ),
      };
      this.emit('progress', progress);
      this.logger.debug(
        `Committed batch ${report.batchesCommitted} (${progress.processed}/${progress.total})`
      );

      await yieldToEventLoop();
    }

    report.completedAt = now;
    this.logger.info(
      `Full reconciliation completed: ${report.tracksProcessed} tracks, ${report.tracksCreated} new, ${report.playsCreated} plays created`
    );
    return report;
  }

  /**
   * Reconcile a single track by id. Returns null when the catalog does not
   * know the track. `currentCounter` overrides the catalog's counter when the
   * caller read a fresher value from the player.
   */
  async reconcileOne(
    trackId: string,
    now: number,
    currentCounter?: number
  ): Promise<TrackReconciliation | null> {
    let catalogTrack: CatalogTrack | null;
    try {
      catalogTrack = await this.catalog.getTrack(trackId);
    } catch (error) {
      throw this.asCatalogError(error);
    }

    if (!catalogTrack) {
      this.logger.debug(`Track ${trackId} is not in the catalog`);
      return null;
    }
    if (currentCounter !== undefined) {
      catalogTrack = { ...catalogTrack, currentPlayCount: currentCounter };
    }
    return this.reconcileTrack(catalogTrack, now);
  }

  /**
   * Reconcile a single track from catalog data the caller already holds
   * (the quick foreground path passes the now-playing item).
   */
  async reconcileTrack(
    catalogTrack: CatalogTrack,
    now: number
  ): Promise<TrackReconciliation> {
    const result = await this.lock.withTrack(catalogTrack.id, () =>
      this.store.transaction(tx =>
        this.reconcileInTransaction(tx, catalogTrack, now)
      )
    );

    if (result.playsCreated > 0) {
      this.logger.info(
        `Detected ${result.playsCreated} new plays for ${catalogTrack.title}`
      );
    }
    return result;
  }

  private reconcileInTransaction(
    tx: LibraryTransaction,
    catalogTrack: CatalogTrack,
    now: number,
    catalogOrder?: number
  ): TrackReconciliation {
    const existing = tx.getTrack(catalogTrack.id);

    if (!existing) {
      tx.upsertTrack(createTrackRecord(catalogTrack, now, catalogOrder));
      this.logger.debug(
        `Added ${catalogTrack.title} with baseline ${catalogTrack.currentPlayCount}`
      );
      return {
        trackId: catalogTrack.id,
        created: true,
        delta: 0,
        playsCreated: 0,
        livePlaysConfirmed: 0,
        counterReset: false,
      };
    }

    const current = catalogTrack.currentPlayCount;
    // Counter value the system itself last showed
    const observed = existing.lastSeenCounter - existing.pendingLiveCredits;
    const delta = current - observed;
    const counterReset = delta < 0;

    const livePlaysConfirmed = counterReset
      ? 0
      : Math.min(delta, existing.pendingLiveCredits);
    let pendingLiveCredits = counterReset
      ? 0
      : existing.pendingLiveCredits - livePlaysConfirmed;
    const newPlays = counterReset ? 0 : delta - livePlaysConfirmed;

    if (counterReset) {
      this.logger.warn(
        `Play counter for ${existing.title} went back from ${observed} to ${current}`
      );
    } else if (
      pendingLiveCredits > 0 &&
      now - (existing.lastLivePlayAt ?? 0) >= PENDING_LIVE_CREDIT_TTL_MS
    ) {
      this.logger.debug(
        `Releasing ${pendingLiveCredits} unconfirmed live plays for ${existing.title}`
      );
      pendingLiveCredits = 0;
    }

    const plays =
      newPlays > 0 ? this.distributePlays(existing, newPlays, now) : [];
    tx.insertPlays(plays);

    tx.upsertTrack({
      ...existing,
      title: catalogTrack.title,
      artist: catalogTrack.artist,
      album: catalogTrack.album,
      durationSeconds: catalogTrack.durationSeconds,
      lastSeenCounter: current + pendingLiveCredits,
      pendingLiveCredits,
      lastReconciledAt: now,
      catalogOrder: catalogOrder ?? existing.catalogOrder,
    });

    return {
      trackId: existing.id,
      created: false,
      delta,
      playsCreated: plays.length,
      livePlaysConfirmed,
      counterReset,
    };
  }

  /**
   * `count` play facts spread uniformly over (lastReconciledAt, now].
   * With no usable window (clock moved backwards) they all land on `now`.
   */
  private distributePlays(
    track: TrackRecord,
    count: number,
    now: number
  ): NewPlayFact[] {
    const windowMs = now - track.lastReconciledAt;
    const timestamps: number[] = [];

    for (let i = 0; i < count; i++) {
      const offset = windowMs > 0 ? Math.floor(this.random() * windowMs) : 0;
      timestamps.push(now - offset);
    }
    timestamps.sort((a, b) => a - b);

    return timestamps.map(timestamp => ({
      trackId: track.id,
      timestamp,
      source: 'counterSync',
      trackDurationSeconds:
        track.durationSeconds > 0 ? track.durationSeconds : undefined,
    }));
  }

  private estimateRemaining(
    clockStart: number,
    processed: number,
    total: number
  ): number {
    const elapsedMs = Math.max(0, this.clock() - clockStart);
    const remainingMs = (elapsedMs / processed) * (total - processed);
    return Math.ceil(remainingMs / SECOND_MS);
  }

  private async enumerateCatalog(): Promise<CatalogTrack[]> {
    try {
      return await this.catalog.enumerateTracks();
    } catch (error) {
      throw this.asCatalogError(error);
    }
  }

  private asCatalogError(error: unknown): Error {
    if (isPlaytallyError(error)) {
      return error;
    }
    return new CatalogUnavailableError('Catalog enumeration failed', error);
  }
}
