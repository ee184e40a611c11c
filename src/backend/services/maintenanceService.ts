import { MaintenanceReport, ResetReport } from '../../shared/types';
import { isPlaytallyError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { DAY_MS } from '../utils/timestamps';

import { CatalogAccessor } from './catalogAccessor';
import { ChartAggregator } from './chartAggregator';
import { EngineStateStore } from './engineStateStore';
import { LibraryStore } from './libraryStore';

export const DEFAULT_PLAY_RETENTION_DAYS = 365;

/**
 * Ledger housekeeping: prunes old play facts into the baseline, drops
 * unplayed tracks that left the catalog, and wipes all data on request.
 */
export class MaintenanceService {
  private store: LibraryStore;
  private catalog: CatalogAccessor;
  private stateStore: EngineStateStore;
  private charts: ChartAggregator;
  private retentionDays: number;
  private logger = createLogger('MaintenanceService');

  constructor(
    store: LibraryStore,
    catalog: CatalogAccessor,
    stateStore: EngineStateStore,
    charts: ChartAggregator,
    retentionDays: number = DEFAULT_PLAY_RETENTION_DAYS
  ) {
    this.store = store;
    this.catalog = catalog;
    this.stateStore = stateStore;
    this.charts = charts;
    this.retentionDays = retentionDays;
  }

  /**
   * Expired facts and removable tracks are chosen inside the ledger
   * transaction, so overlapping runs and concurrent live plays see each
   * other's commits.
   */
  async performMaintenance(now: number): Promise<MaintenanceReport> {
    const cutoff = now - this.retentionDays * DAY_MS;
    const catalogIds = await this.readCatalogIds();

    const report = await this.store.transaction(tx => {
      const expiredByTrack = new Map<string, string[]>();
      for (const play of tx.queryPlays({ until: cutoff - 1 })) {
        const ids = expiredByTrack.get(play.trackId) ?? [];
        ids.push(play.id);
        expiredByTrack.set(play.trackId, ids);
      }

      let playsPruned = 0;
      for (const [trackId, playIds] of expiredByTrack) {
        const track = tx.getTrack(trackId);
        if (!track) {
          continue;
        }
        tx.deletePlays(playIds);
        // Keep the all-time total unchanged
        tx.upsertTrack({
          ...track,
          baselineCounter: track.baselineCounter + playIds.length,
        });
        playsPruned += playIds.length;
      }

      let tracksRemoved = 0;
      if (catalogIds) {
        const played = new Set(tx.queryPlays().map(play => play.trackId));
        for (const track of tx.listTracks()) {
          if (
            !catalogIds.has(track.id) &&
            track.baselineCounter === 0 &&
            !played.has(track.id)
          ) {
            tx.deleteTrack(track.id);
            tracksRemoved++;
          }
        }
      }

      return { playsPruned, tracksRemoved };
    });

    this.logger.info(
      `Maintenance completed: ${report.playsPruned} plays pruned, ${report.tracksRemoved} tracks removed`
    );
    return report;
  }

  /**
   * Delete every track with its play facts, clear the recorded ranks and
   * reset the engine flags so the next activation seeds the library again.
   */
  async resetAll(): Promise<ResetReport> {
    const report = await this.store.transaction(tx => {
      const tracks = tx.listTracks();
      const playsRemoved = tx.queryPlays().length;
      for (const track of tracks) {
        tx.deleteTrack(track.id);
      }
      return { tracksRemoved: tracks.length, playsRemoved };
    });

    await this.charts.clearRankBook();
    await this.stateStore.reset();

    this.logger.warn(
      `All data deleted: ${report.tracksRemoved} tracks, ${report.playsRemoved} plays`
    );
    return report;
  }

  /**
   * Ids the catalog currently lists, or null when it cannot be read (nothing
   * is removed then).
   */
  private async readCatalogIds(): Promise<Set<string> | null> {
    try {
      const catalogTracks = await this.catalog.enumerateTracks();
      return new Set(catalogTracks.map(track => track.id));
    } catch (error) {
      if (isPlaytallyError(error) && error.code === 'PERMISSION_DENIED') {
        throw error;
      }
      this.logger.warn('Catalog unavailable, keeping orphaned tracks', error);
      return null;
    }
  }
}
