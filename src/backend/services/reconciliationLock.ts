import AsyncLock from 'async-lock';

const trackKey = (trackId: string) => `track:${trackId}`;

/**
 * Per-track mutual exclusion for everything that advances a track's
 * accounted-for counter: live play persistence, quick reconciliation, and
 * the batch of a full reconciliation that contains the track.
 */
export class ReconciliationLock {
  // Full-catalog batches queue one acquisition per track
  private lock = new AsyncLock({ maxPending: Infinity });

  withTrack<T>(trackId: string, fn: () => Promise<T>): Promise<T> {
    return this.lock.acquire<T>(trackKey(trackId), fn);
  }

  /**
   * Hold every listed track at once. Keys are de-duplicated and sorted so two
   * multi-track holders can never wait on each other in opposite order.
   */
  withTracks<T>(trackIds: string[], fn: () => Promise<T>): Promise<T> {
    const keys = [...new Set(trackIds)].sort().map(trackKey);
    if (keys.length === 0) {
      return fn();
    }
    return this.lock.acquire<T>(keys, fn);
  }

  isBusy(trackId?: string): boolean {
    return this.lock.isBusy(trackId !== undefined ? trackKey(trackId) : undefined);
  }
}
