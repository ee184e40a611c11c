import { EventEmitter } from 'events';

import { SyncOutcome, SyncStatus } from '../../shared/types';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { HOUR_MS } from '../utils/timestamps';

import { CatalogAccessor } from './catalogAccessor';
import { CounterReconciler } from './counterReconciler';
import { EngineStateStore } from './engineStateStore';

export const DEFAULT_FULL_SYNC_INTERVAL_MS = 4 * HOUR_MS;

export function shouldRunFullSync(
  lastFullSyncAt: number | null,
  now: number,
  intervalMs: number = DEFAULT_FULL_SYNC_INTERVAL_MS
): boolean {
  if (lastFullSyncAt === null) {
    return true;
  }
  return now - lastFullSyncAt >= intervalMs;
}

export interface SyncSchedulerOptions {
  fullSyncIntervalMs?: number;
}

/**
 * Decides on launch or foreground whether to run a full reconciliation or
 * only check the now-playing track. Emits `statusChange` with a
 * {@link SyncStatus} whenever the status moves.
 */
export class SyncScheduler extends EventEmitter {
  private reconciler: CounterReconciler;
  private catalog: CatalogAccessor;
  private stateStore: EngineStateStore;
  private fullSyncIntervalMs: number;
  private logger = createLogger('SyncScheduler');

  private syncStatus: SyncStatus = { status: 'idle' };
  private running: Promise<SyncOutcome> | null = null;

  constructor(
    reconciler: CounterReconciler,
    catalog: CatalogAccessor,
    stateStore: EngineStateStore,
    options: SyncSchedulerOptions = {}
  ) {
    super();
    this.reconciler = reconciler;
    this.catalog = catalog;
    this.stateStore = stateStore;
    this.fullSyncIntervalMs =
      options.fullSyncIntervalMs ?? DEFAULT_FULL_SYNC_INTERVAL_MS;
  }

  getSyncStatus(): SyncStatus {
    return { ...this.syncStatus };
  }

  isSyncing(): boolean {
    return this.running !== null;
  }

  /**
   * Launch/foreground entry point. Joins the running sync if there is one.
   */
  onAppActivated(now: number): Promise<SyncOutcome> {
    if (this.running) {
      this.logger.debug('Sync already in progress, joining it');
      return this.running;
    }
    return this.track(this.activate(now));
  }

  /**
   * Full reconciliation regardless of the interval. Used by seeding.
   */
  runFullSync(now: number): Promise<SyncOutcome> {
    if (this.running) {
      return this.running;
    }
    return this.track(this.fullSync(now));
  }

  private async track(work: Promise<SyncOutcome>): Promise<SyncOutcome> {
    this.running = work;
    try {
      return await work;
    } finally {
      this.running = null;
    }
  }

  private async activate(now: number): Promise<SyncOutcome> {
    const state = await this.stateStore.get();
    if (shouldRunFullSync(state.lastFullSyncAt, now, this.fullSyncIntervalMs)) {
      return this.fullSync(now);
    }
    return this.quickSync(now);
  }

  private async fullSync(now: number): Promise<SyncOutcome> {
    this.updateStatus({ status: 'syncing', mode: 'full' });
    try {
      const report = await this.reconciler.reconcileAll(now);
      await this.stateStore.update({ lastFullSyncAt: now });
      this.updateStatus({
        status: 'completed',
        mode: 'full',
        lastSyncTimestamp: now,
        playsCreated: report.playsCreated,
      });
      return { mode: 'full', report };
    } catch (error) {
      this.fail('full', error);
      throw error;
    }
  }

  private async quickSync(now: number): Promise<SyncOutcome> {
    this.updateStatus({ status: 'syncing', mode: 'quick' });
    try {
      const nowPlaying = await this.catalog.currentlyPlayingTrack();
      if (!nowPlaying) {
        this.logger.debug('Nothing playing, skipping quick sync');
        this.updateStatus({ status: 'idle', mode: 'skipped' });
        return { mode: 'skipped', report: null, quickResult: null };
      }

      const result = await this.reconciler.reconcileTrack(nowPlaying, now);
      await this.stateStore.update({ lastQuickSyncAt: now });
      this.updateStatus({
        status: 'completed',
        mode: 'quick',
        lastSyncTimestamp: now,
        playsCreated: result.playsCreated,
      });
      return { mode: 'quick', report: null, quickResult: result };
    } catch (error) {
      this.fail('quick', error);
      throw error;
    }
  }

  private fail(mode: 'full' | 'quick', error: unknown): void {
    this.logger.error(`${mode} sync failed`, error);
    this.updateStatus({ status: 'error', mode, error: errorMessage(error) });
  }

  private updateStatus(status: SyncStatus): void {
    this.syncStatus = status;
    this.emit('statusChange', this.getSyncStatus());
  }
}
