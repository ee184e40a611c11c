import {
  CatalogTrack,
  PlaybackState,
  PlayerNotification,
} from '../../shared/types';

import { MediaPlayer } from './playbackSampler';

/**
 * MediaPlayer fed from outside the process: the OS integration layer posts
 * now-playing and transport changes over the local HTTP bridge, and this
 * class replays them as player notifications.
 */
export class BridgedMediaPlayer implements MediaPlayer {
  private item: CatalogTrack | null = null;
  private state: PlaybackState = 'unknown';
  private listeners = new Set<(notification: PlayerNotification) => void>();

  nowPlayingItem(): CatalogTrack | null {
    return this.item;
  }

  playbackState(): PlaybackState {
    return this.state;
  }

  subscribe(listener: (notification: PlayerNotification) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Replace the loaded item, optionally together with the transport state.
   * Notifies item change first so the outgoing track is finalized before the
   * new state is looked at.
   */
  setNowPlaying(item: CatalogTrack | null, state?: PlaybackState): void {
    const itemChanged = item?.id !== this.item?.id;
    this.item = item;
    const stateChanged = state !== undefined && state !== this.state;
    if (state !== undefined) {
      this.state = state;
    }

    if (itemChanged) {
      this.notify({ type: 'nowPlayingItemChanged' });
    } else if (stateChanged) {
      this.notify({ type: 'playbackStateChanged' });
    }
  }

  setPlaybackState(state: PlaybackState): void {
    if (state === this.state) {
      return;
    }
    this.state = state;
    this.notify({ type: 'playbackStateChanged' });
  }

  private notify(notification: PlayerNotification): void {
    for (const listener of [...this.listeners]) {
      listener(notification);
    }
  }
}
