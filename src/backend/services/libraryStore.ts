import { randomUUID } from 'crypto';

import AsyncLock from 'async-lock';

import {
  NewPlayFact,
  PlayFact,
  PlayQuery,
  TrackRecord,
} from '../../shared/types';
import { PersistenceFailureError } from '../utils/errors';
import { FileStorage } from '../utils/fileStorage';
import { createLogger } from '../utils/logger';

export const LEDGER_FILE = 'library/ledger.json';
const LEDGER_VERSION = 1;

/**
 * Staged view of the ledger inside a transaction. Reads see the staged
 * changes; nothing is visible to other readers until commit.
 */
export interface LibraryTransaction {
  getTrack(trackId: string): TrackRecord | null;
  listTracks(): TrackRecord[];
  /** Staged play facts matching the query, oldest first */
  queryPlays(query?: PlayQuery): PlayFact[];
  upsertTrack(track: TrackRecord): void;
  insertPlay(play: NewPlayFact): PlayFact;
  insertPlays(plays: NewPlayFact[]): PlayFact[];
  /** Deletes the track and all of its play facts */
  deleteTrack(trackId: string): void;
  deletePlays(playIds: string[]): void;
}

/**
 * Persistence collaborator for tracks and play facts.
 */
export interface LibraryStore {
  getTrack(trackId: string): Promise<TrackRecord | null>;
  listTracks(): Promise<TrackRecord[]>;
  /** Play facts matching the query, oldest first */
  queryPlays(query?: PlayQuery): Promise<PlayFact[]>;
  countPlays(query?: PlayQuery): Promise<number>;
  /**
   * Runs `fn` against a staged transaction and commits its changes
   * atomically. If `fn` throws, or the commit fails, nothing is kept.
   */
  transaction<T>(fn: (tx: LibraryTransaction) => T | Promise<T>): Promise<T>;
  deleteTrack(trackId: string): Promise<boolean>;
}

interface LedgerFile {
  version: number;
  tracks: Record<string, TrackRecord>;
  plays: PlayFact[];
}

function matchesQuery(play: PlayFact, query: PlayQuery): boolean {
  return (
    (query.trackId === undefined || play.trackId === query.trackId) &&
    (query.since === undefined || play.timestamp >= query.since) &&
    (query.until === undefined || play.timestamp <= query.until) &&
    (query.source === undefined || play.source === query.source)
  );
}

const byTimestamp = (a: PlayFact, b: PlayFact) => a.timestamp - b.timestamp;

/** Ledgers written before pending live credits existed have none */
function withPendingCredits(
  tracks: Record<string, TrackRecord>
): Record<string, TrackRecord> {
  const normalized: Record<string, TrackRecord> = {};
  for (const [id, track] of Object.entries(tracks)) {
    normalized[id] = {
      ...track,
      pendingLiveCredits:
        typeof track.pendingLiveCredits === 'number'
          ? track.pendingLiveCredits
          : 0,
    };
  }
  return normalized;
}

class StagedTransaction implements LibraryTransaction {
  readonly upserts = new Map<string, TrackRecord>();
  readonly deletedTracks = new Set<string>();
  readonly deletedPlays = new Set<string>();
  readonly inserted: PlayFact[] = [];

  constructor(private readonly committed: LedgerFile) {}

  getTrack(trackId: string): TrackRecord | null {
    if (this.deletedTracks.has(trackId)) {
      return null;
    }
    const track = this.upserts.get(trackId) ?? this.committed.tracks[trackId];
    return track ? { ...track } : null;
  }

  listTracks(): TrackRecord[] {
    const ids = new Set([
      ...Object.keys(this.committed.tracks),
      ...this.upserts.keys(),
    ]);
    const tracks: TrackRecord[] = [];
    for (const id of ids) {
      const track = this.getTrack(id);
      if (track) {
        tracks.push(track);
      }
    }
    return tracks;
  }

  queryPlays(query: PlayQuery = {}): PlayFact[] {
    return this.committed.plays
      .concat(this.inserted)
      .filter(
        play =>
          !this.deletedPlays.has(play.id) &&
          !this.deletedTracks.has(play.trackId) &&
          matchesQuery(play, query)
      )
      .map(play => ({ ...play }))
      .sort(byTimestamp);
  }

  upsertTrack(track: TrackRecord): void {
    this.deletedTracks.delete(track.id);
    this.upserts.set(track.id, { ...track });
  }

  insertPlay(play: NewPlayFact): PlayFact {
    if (!this.getTrack(play.trackId)) {
      throw new Error(`Cannot record a play for unknown track ${play.trackId}`);
    }
    const fact: PlayFact = { id: randomUUID(), ...play };
    this.inserted.push(fact);
    return fact;
  }

  insertPlays(plays: NewPlayFact[]): PlayFact[] {
    return plays.map(play => this.insertPlay(play));
  }

  deleteTrack(trackId: string): void {
    this.upserts.delete(trackId);
    this.deletedTracks.add(trackId);
  }

  deletePlays(playIds: string[]): void {
    for (const id of playIds) {
      this.deletedPlays.add(id);
    }
  }

  hasChanges(): boolean {
    return (
      this.upserts.size > 0 ||
      this.deletedTracks.size > 0 ||
      this.deletedPlays.size > 0 ||
      this.inserted.length > 0
    );
  }

  /** Build the next ledger without mutating the committed one */
  apply(): LedgerFile {
    const tracks = { ...this.committed.tracks };
    for (const [id, track] of this.upserts) {
      tracks[id] = track;
    }
    for (const id of this.deletedTracks) {
      delete tracks[id];
    }

    let plays = this.committed.plays;
    if (this.deletedTracks.size > 0 || this.deletedPlays.size > 0) {
      plays = plays.filter(
        play =>
          !this.deletedPlays.has(play.id) &&
          !this.deletedTracks.has(play.trackId)
      );
    }
    const inserted = this.inserted.filter(
      play =>
        !this.deletedPlays.has(play.id) && !this.deletedTracks.has(play.trackId)
    );
    if (inserted.length > 0) {
      plays = plays.concat(inserted);
    }

    return { version: LEDGER_VERSION, tracks, plays };
  }
}

/**
 * LibraryStore backed by a single JSON ledger file. The whole ledger is held
 * in memory; every commit rewrites the file and swaps the in-memory copy only
 * after the write succeeded.
 */
export class FileLibraryStore implements LibraryStore {
  private fileStorage: FileStorage;
  private logger = createLogger('FileLibraryStore');
  private ledger: LedgerFile | null = null;
  private playsByTrack = new Map<string, PlayFact[]>();
  private commitLock = new AsyncLock();

  constructor(fileStorage: FileStorage) {
    this.fileStorage = fileStorage;
  }

  private async load(): Promise<LedgerFile> {
    if (this.ledger) {
      return this.ledger;
    }

    const stored = await this.fileStorage.readJSON<LedgerFile>(LEDGER_FILE);
    const ledger: LedgerFile =
      stored && stored.tracks && Array.isArray(stored.plays)
        ? {
            version: LEDGER_VERSION,
            tracks: withPendingCredits(stored.tracks),
            plays: stored.plays,
          }
        : { version: LEDGER_VERSION, tracks: {}, plays: [] };

    this.setLedger(ledger);
    this.logger.debug(
      `Loaded ledger: ${Object.keys(ledger.tracks).length} tracks, ${ledger.plays.length} plays`
    );
    return ledger;
  }

  private setLedger(ledger: LedgerFile): void {
    this.ledger = ledger;
    this.playsByTrack.clear();
    for (const play of ledger.plays) {
      const existing = this.playsByTrack.get(play.trackId);
      if (existing) {
        existing.push(play);
      } else {
        this.playsByTrack.set(play.trackId, [play]);
      }
    }
  }

  async getTrack(trackId: string): Promise<TrackRecord | null> {
    const ledger = await this.load();
    const track = ledger.tracks[trackId];
    return track ? { ...track } : null;
  }

  async listTracks(): Promise<TrackRecord[]> {
    const ledger = await this.load();
    return Object.values(ledger.tracks).map(track => ({ ...track }));
  }

  async queryPlays(query: PlayQuery = {}): Promise<PlayFact[]> {
    const ledger = await this.load();
    const source =
      query.trackId !== undefined
        ? (this.playsByTrack.get(query.trackId) ?? [])
        : ledger.plays;

    return source
      .filter(play => matchesQuery(play, query))
      .map(play => ({ ...play }))
      .sort(byTimestamp);
  }

  async countPlays(query: PlayQuery = {}): Promise<number> {
    const ledger = await this.load();
    if (
      query.since === undefined &&
      query.until === undefined &&
      query.source === undefined
    ) {
      return query.trackId !== undefined
        ? (this.playsByTrack.get(query.trackId)?.length ?? 0)
        : ledger.plays.length;
    }
    return (await this.queryPlays(query)).length;
  }

  async transaction<T>(
    fn: (tx: LibraryTransaction) => T | Promise<T>
  ): Promise<T> {
    return this.commitLock.acquire<T>('commit', async (): Promise<T> => {
      const committed = await this.load();
      const tx = new StagedTransaction(committed);
      const result = await fn(tx);

      if (!tx.hasChanges()) {
        return result;
      }

      const next = tx.apply();
      try {
        await this.fileStorage.writeJSON(LEDGER_FILE, next);
      } catch (error) {
        throw new PersistenceFailureError('Failed to commit play ledger', error);
      }
      this.setLedger(next);
      return result;
    });
  }

  async deleteTrack(trackId: string): Promise<boolean> {
    return this.transaction(tx => {
      if (!tx.getTrack(trackId)) {
        return false;
      }
      tx.deleteTrack(trackId);
      return true;
    });
  }
}
