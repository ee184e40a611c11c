import { EngineState } from '../../shared/types';
import { FileStorage } from '../utils/fileStorage';
import { createLogger } from '../utils/logger';

export const ENGINE_STATE_FILE = 'state/engine-state.json';

export const DEFAULT_ENGINE_STATE: EngineState = {
  hasSeededLibrary: false,
  lastFullSyncAt: null,
  lastQuickSyncAt: null,
};

/**
 * Persisted engine flags (seeding done, last sync times).
 */
export class EngineStateStore {
  private fileStorage: FileStorage;
  private logger = createLogger('EngineStateStore');
  private cached: EngineState | null = null;

  constructor(fileStorage: FileStorage) {
    this.fileStorage = fileStorage;
  }

  async get(): Promise<EngineState> {
    if (this.cached) {
      return { ...this.cached };
    }

    const stored =
      await this.fileStorage.readJSON<Partial<EngineState>>(ENGINE_STATE_FILE);
    this.cached = {
      hasSeededLibrary: stored?.hasSeededLibrary === true,
      lastFullSyncAt:
        typeof stored?.lastFullSyncAt === 'number'
          ? stored.lastFullSyncAt
          : null,
      lastQuickSyncAt:
        typeof stored?.lastQuickSyncAt === 'number'
          ? stored.lastQuickSyncAt
          : null,
    };
    return { ...this.cached };
  }

  /** Back to first-launch state */
  async reset(): Promise<EngineState> {
    return this.update({ ...DEFAULT_ENGINE_STATE });
  }

  async update(changes: Partial<EngineState>): Promise<EngineState> {
    const next: EngineState = { ...(await this.get()), ...changes };
    await this.fileStorage.writeJSONWithBackup(ENGINE_STATE_FILE, next);
    this.cached = next;
    this.logger.debug('Engine state saved', next);
    return { ...next };
  }
}
