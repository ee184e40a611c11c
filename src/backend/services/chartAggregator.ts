import { EventEmitter } from 'events';

import AsyncLock from 'async-lock';

import {
  CHART_PERIODS,
  ChartPeriod,
  RankBookData,
  RankChange,
  RankMovement,
  RankedTrack,
  SourceBreakdown,
  TrackRecord,
} from '../../shared/types';
import { FileStorage } from '../utils/fileStorage';
import { createLogger } from '../utils/logger';
import {
  startOfLocalMonth,
  startOfLocalWeek,
  startOfLocalYear,
} from '../utils/timestamps';

import { LibraryStore } from './libraryStore';

export const RANK_BOOK_FILE = 'charts/rank-book.json';

export interface RankedTracksOptions {
  /** Store the computed ranks and emit `rankChanged` for moved tracks */
  record?: boolean;
}

/**
 * Start of the chart window for a period in local time, or null for all-time.
 */
export function periodStart(period: ChartPeriod, now: number): number | null {
  switch (period) {
    case 'week':
      return startOfLocalWeek(now);
    case 'month':
      return startOfLocalMonth(now);
    case 'year':
      return startOfLocalYear(now);
    case 'allTime':
      return null;
  }
}

export function rankMovement(
  previousRank: number | undefined,
  rank: number
): RankMovement {
  if (previousRank === undefined) {
    return { kind: 'new' };
  }
  if (previousRank === rank) {
    return { kind: 'unchanged' };
  }
  return previousRank > rank
    ? { kind: 'up', positions: previousRank - rank }
    : { kind: 'down', positions: rank - previousRank };
}

const emptyRankBook = (): RankBookData => ({
  allTime: {},
  week: {},
  month: {},
  year: {},
});

const compareForChart = (
  a: { track: TrackRecord; count: number },
  b: { track: TrackRecord; count: number }
): number =>
  b.count - a.count ||
  (a.track.catalogOrder ?? Number.MAX_SAFE_INTEGER) -
    (b.track.catalogOrder ?? Number.MAX_SAFE_INTEGER) ||
  a.track.title.localeCompare(b.track.title);

/**
 * Play counts and ranked charts over the ledger.
 *
 * All-time counts include each track's baseline; period views only count
 * play facts inside the window. Emits `rankChanged` ({@link RankChange})
 * when a recorded computation moves a track.
 */
export class ChartAggregator extends EventEmitter {
  private store: LibraryStore;
  private fileStorage: FileStorage;
  private logger = createLogger('ChartAggregator');
  private rankBook: RankBookData | null = null;
  private rankBookLock = new AsyncLock();

  constructor(store: LibraryStore, fileStorage: FileStorage) {
    super();
    this.store = store;
    this.fileStorage = fileStorage;
  }

  async totalPlayCount(trackId: string): Promise<number> {
    const track = await this.store.getTrack(trackId);
    if (!track) {
      return 0;
    }
    return track.baselineCounter + (await this.store.countPlays({ trackId }));
  }

  async periodPlayCount(trackId: string, since: number): Promise<number> {
    return this.store.countPlays({ trackId, since });
  }

  /**
   * Play facts by source for one track. The baseline only counts when no
   * `since` bound is given. Returns null for an unknown track.
   */
  async sourceBreakdown(
    trackId: string,
    since?: number
  ): Promise<SourceBreakdown | null> {
    const track = await this.store.getTrack(trackId);
    if (!track) {
      return null;
    }

    const plays = await this.store.queryPlays({ trackId, since });
    const live = plays.filter(play => play.source === 'live').length;
    const counterSync = plays.length - live;
    const baseline = since === undefined ? track.baselineCounter : 0;

    return { live, counterSync, baseline, total: live + counterSync + baseline };
  }

  async rankedTracks(
    period: ChartPeriod,
    now: number,
    options: RankedTracksOptions = {}
  ): Promise<RankedTrack[]> {
    return this.rankBookLock.acquire<RankedTrack[]>(
      'rankBook',
      async (): Promise<RankedTrack[]> => {
        const counted = await this.countByTrack(period, now);
        const rankBook = await this.loadRankBook();
        const previous = rankBook[period];

        const ranked: RankedTrack[] = counted
          .sort(compareForChart)
          .map(({ track, count }, index) => ({
            rank: index + 1,
            trackId: track.id,
            title: track.title,
            artist: track.artist,
            album: track.album,
            playCount: count,
            movement: rankMovement(previous[track.id], index + 1),
          }));

        if (options.record) {
          await this.record(period, ranked, previous);
        }
        return ranked;
      }
    );
  }

  async getRankBook(): Promise<RankBookData> {
    const rankBook = await this.loadRankBook();
    return {
      allTime: { ...rankBook.allTime },
      week: { ...rankBook.week },
      month: { ...rankBook.month },
      year: { ...rankBook.year },
    };
  }

  /** Forget every recorded rank; the next recording reports all as new */
  async clearRankBook(): Promise<void> {
    await this.rankBookLock.acquire<void>('rankBook', async () => {
      const next = emptyRankBook();
      await this.fileStorage.writeJSON(RANK_BOOK_FILE, next);
      this.rankBook = next;
    });
  }

  private async countByTrack(
    period: ChartPeriod,
    now: number
  ): Promise<Array<{ track: TrackRecord; count: number }>> {
    const since = periodStart(period, now);
    const tracks = await this.store.listTracks();
    const plays = await this.store.queryPlays(
      since === null ? {} : { since }
    );

    const counts = new Map<string, number>();
    for (const play of plays) {
      counts.set(play.trackId, (counts.get(play.trackId) ?? 0) + 1);
    }

    return tracks
      .map(track => ({
        track,
        count:
          (counts.get(track.id) ?? 0) +
          (since === null ? track.baselineCounter : 0),
      }))
      .filter(entry => entry.count > 0);
  }

  private async record(
    period: ChartPeriod,
    ranked: RankedTrack[],
    previous: Record<string, number>
  ): Promise<void> {
    const ranks: Record<string, number> = {};
    const changes: RankChange[] = [];

    for (const entry of ranked) {
      ranks[entry.trackId] = entry.rank;
      const previousRank = previous[entry.trackId];
      if (previousRank !== undefined && previousRank !== entry.rank) {
        changes.push({
          trackId: entry.trackId,
          period,
          previousRank,
          newRank: entry.rank,
        });
      }
    }

    const rankBook = await this.loadRankBook();
    const next: RankBookData = { ...rankBook, [period]: ranks };
    await this.fileStorage.writeJSON(RANK_BOOK_FILE, next);
    this.rankBook = next;

    for (const change of changes) {
      this.emit('rankChanged', change);
    }
    if (changes.length > 0) {
      this.logger.debug(`${changes.length} rank changes in ${period} chart`);
    }
  }

  private async loadRankBook(): Promise<RankBookData> {
    if (this.rankBook) {
      return this.rankBook;
    }

    const stored =
      await this.fileStorage.readJSON<Partial<RankBookData>>(RANK_BOOK_FILE);
    const rankBook = emptyRankBook();
    if (stored) {
      for (const period of CHART_PERIODS) {
        rankBook[period] = { ...stored[period] };
      }
    }
    this.rankBook = rankBook;
    return rankBook;
  }
}
