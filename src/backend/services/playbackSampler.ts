import { EventEmitter } from 'events';

import {
  CatalogTrack,
  PlaybackState,
  PlayerNotification,
} from '../../shared/types';
import { createLogger } from '../utils/logger';

/**
 * The live media-player observation primitive: the currently loaded item,
 * the transport state, and change notifications.
 */
export interface MediaPlayer {
  nowPlayingItem(): CatalogTrack | null;
  playbackState(): PlaybackState;
  /** Returns an unsubscribe function */
  subscribe(listener: (notification: PlayerNotification) => void): () => void;
}

export type PlaybackEvent =
  | { type: 'trackChanged'; track: CatalogTrack | null; isPlaying: boolean }
  | { type: 'playbackStarted'; track: CatalogTrack }
  | { type: 'playbackPaused' }
  | { type: 'playbackStopped' }
  | { type: 'playbackInterrupted' };

/**
 * Turns raw player notifications into discrete playback events.
 *
 * Notifications are coalesced against the last observed item and state, so
 * repeated "state changed" callbacks with the same state produce nothing.
 * Emits `playbackEvent` with a {@link PlaybackEvent}.
 */
export class PlaybackSampler extends EventEmitter {
  private player: MediaPlayer;
  private logger = createLogger('PlaybackSampler');
  private unsubscribe: (() => void) | null = null;
  private lastTrackId: string | null = null;
  private lastState: PlaybackState = 'unknown';

  constructor(player: MediaPlayer) {
    super();
    this.player = player;
  }

  isRunning(): boolean {
    return this.unsubscribe !== null;
  }

  /**
   * Begin observing. If something is already loaded, a `trackChanged` event
   * for it is emitted immediately.
   */
  start(): void {
    if (this.unsubscribe) {
      return;
    }

    this.unsubscribe = this.player.subscribe(notification =>
      this.handleNotification(notification)
    );
    this.logger.debug('Started observing player');

    const item = this.player.nowPlayingItem();
    this.lastState = this.player.playbackState();
    if (item) {
      this.lastTrackId = item.id;
      this.publish({
        type: 'trackChanged',
        track: item,
        isPlaying: this.lastState === 'playing',
      });
    }
  }

  stop(): void {
    if (!this.unsubscribe) {
      return;
    }
    this.unsubscribe();
    this.unsubscribe = null;
    this.lastTrackId = null;
    this.lastState = 'unknown';
    this.logger.debug('Stopped observing player');
  }

  handleNotification(notification: PlayerNotification): void {
    switch (notification.type) {
      case 'nowPlayingItemChanged':
        this.handleItemChange();
        break;
      case 'playbackStateChanged':
        this.handleStateChange();
        break;
    }
  }

  private handleItemChange(): void {
    const item = this.player.nowPlayingItem();
    const state = this.player.playbackState();
    const itemId = item?.id ?? null;

    if (itemId === this.lastTrackId) {
      // Same item re-announced; only the state may have moved
      if (state !== this.lastState) {
        this.handleStateChange();
      }
      return;
    }

    this.lastTrackId = itemId;
    this.lastState = state;
    this.publish({
      type: 'trackChanged',
      track: item,
      isPlaying: state === 'playing',
    });
  }

  private handleStateChange(): void {
    const state = this.player.playbackState();
    if (state === this.lastState || state === 'unknown') {
      return;
    }
    this.lastState = state;

    switch (state) {
      case 'playing': {
        const item = this.player.nowPlayingItem();
        if (!item) {
          return;
        }
        if (item.id !== this.lastTrackId) {
          this.lastTrackId = item.id;
          this.publish({ type: 'trackChanged', track: item, isPlaying: true });
        } else {
          this.publish({ type: 'playbackStarted', track: item });
        }
        break;
      }
      case 'paused':
        this.publish({ type: 'playbackPaused' });
        break;
      case 'stopped':
        this.publish({ type: 'playbackStopped' });
        break;
      case 'interrupted':
        this.publish({ type: 'playbackInterrupted' });
        break;
    }
  }

  private publish(event: PlaybackEvent): void {
    this.logger.debug(`Playback event: ${event.type}`);
    this.emit('playbackEvent', event);
  }
}
