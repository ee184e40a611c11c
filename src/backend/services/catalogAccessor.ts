import { CatalogTrack } from '../../shared/types';
import {
  CatalogUnavailableError,
  PermissionDeniedError,
  isPlaytallyError,
} from '../utils/errors';
import { FileStorage } from '../utils/fileStorage';
import { createLogger } from '../utils/logger';
import { isRecord, parseCatalogTrack } from '../utils/validation';

import { MediaPlayer } from './playbackSampler';

const MAX_LOGGED_SKIPPED_IDS = 20;

const describeEntryId = (entry: unknown): string =>
  isRecord(entry) && entry.id !== undefined ? String(entry.id) : '<no id>';

/**
 * Read access to the user's media catalog and its system play counters.
 */
export interface CatalogAccessor {
  enumerateTracks(): Promise<CatalogTrack[]>;
  getTrack(trackId: string): Promise<CatalogTrack | null>;
  currentlyPlayingTrack(): Promise<CatalogTrack | null>;
}

/**
 * Shape of the catalog snapshot written by the OS integration layer.
 * `authorized: false` means the user revoked library access.
 */
export interface CatalogSnapshot {
  authorized?: boolean;
  generatedAt?: number;
  tracks: unknown[];
}

/**
 * Catalog backed by a JSON snapshot under the data directory. The snapshot
 * is re-read on every enumeration so counters are always current.
 */
export class JsonCatalogAccessor implements CatalogAccessor {
  private fileStorage: FileStorage;
  private catalogFile: string;
  private player: MediaPlayer | null;
  private logger = createLogger('JsonCatalogAccessor');

  constructor(
    fileStorage: FileStorage,
    catalogFile: string,
    player?: MediaPlayer
  ) {
    this.fileStorage = fileStorage;
    this.catalogFile = catalogFile;
    this.player = player ?? null;
  }

  async enumerateTracks(): Promise<CatalogTrack[]> {
    let snapshot: CatalogSnapshot | null;
    try {
      snapshot = await this.fileStorage.readJSON<CatalogSnapshot>(
        this.catalogFile
      );
    } catch (error) {
      throw new CatalogUnavailableError(
        `Could not read catalog snapshot ${this.catalogFile}`,
        error
      );
    }

    if (!snapshot) {
      throw new CatalogUnavailableError(
        `Catalog snapshot ${this.catalogFile} does not exist yet`
      );
    }
    if (snapshot.authorized === false) {
      throw new PermissionDeniedError();
    }
    if (!Array.isArray(snapshot.tracks)) {
      throw new CatalogUnavailableError(
        `Catalog snapshot ${this.catalogFile} has no track list`
      );
    }

    const tracks: CatalogTrack[] = [];
    const skippedIds: string[] = [];
    for (const entry of snapshot.tracks) {
      const track = parseCatalogTrack(entry);
      if (track) {
        tracks.push(track);
      } else {
        skippedIds.push(describeEntryId(entry));
      }
    }
    if (skippedIds.length > 0) {
      this.logger.warn(
        `Skipped ${skippedIds.length} malformed catalog entries`,
        { ids: skippedIds.slice(0, MAX_LOGGED_SKIPPED_IDS) }
      );
    }
    return tracks;
  }

  async getTrack(trackId: string): Promise<CatalogTrack | null> {
    const tracks = await this.enumerateTracks();
    return tracks.find(track => track.id === trackId) ?? null;
  }

  /**
   * The player's now-playing item, with the snapshot's counter when the
   * snapshot knows the track.
   */
  async currentlyPlayingTrack(): Promise<CatalogTrack | null> {
    const item = this.player?.nowPlayingItem() ?? null;
    if (!item) {
      return null;
    }

    try {
      return (await this.getTrack(item.id)) ?? item;
    } catch (error) {
      if (isPlaytallyError(error) && error.code === 'PERMISSION_DENIED') {
        throw error;
      }
      this.logger.warn(
        `Catalog lookup for now-playing ${item.id} failed, using player data`,
        error
      );
      return item;
    }
  }
}
