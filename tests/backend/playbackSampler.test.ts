import { BridgedMediaPlayer } from '../../src/backend/services/bridgedMediaPlayer';
import {
  PlaybackEvent,
  PlaybackSampler,
} from '../../src/backend/services/playbackSampler';

import { createCatalogTrack } from './helpers/inMemoryCatalog';

describe('PlaybackSampler', () => {
  const trackA = createCatalogTrack({ id: 'track-a' });
  const trackB = createCatalogTrack({ id: 'track-b', title: 'Other' });

  let player: BridgedMediaPlayer;
  let sampler: PlaybackSampler;
  let events: PlaybackEvent[];

  beforeEach(() => {
    player = new BridgedMediaPlayer();
    sampler = new PlaybackSampler(player);
    events = [];
    sampler.on('playbackEvent', (event: PlaybackEvent) => events.push(event));
  });

  afterEach(() => {
    sampler.stop();
  });

  it('should announce an already playing item on start', () => {
    // Arrange
    player.setNowPlaying(trackA, 'playing');

    // Act
    sampler.start();

    // Assert
    expect(events).toEqual([
      { type: 'trackChanged', track: trackA, isPlaying: true },
    ]);
  });

  it('should emit nothing on start when no item is loaded', () => {
    sampler.start();

    expect(sampler.isRunning()).toBe(true);
    expect(events).toEqual([]);
  });

  it('should translate item and state changes into playback events', () => {
    sampler.start();

    player.setNowPlaying(trackA, 'playing');
    player.setPlaybackState('paused');
    player.setPlaybackState('playing');
    player.setNowPlaying(trackB);
    player.setPlaybackState('interrupted');
    player.setPlaybackState('stopped');

    expect(events).toEqual([
      { type: 'trackChanged', track: trackA, isPlaying: true },
      { type: 'playbackPaused' },
      { type: 'playbackStarted', track: trackA },
      { type: 'trackChanged', track: trackB, isPlaying: true },
      { type: 'playbackInterrupted' },
      { type: 'playbackStopped' },
    ]);
  });

  it('should coalesce repeated notifications with the same state', () => {
    sampler.start();
    player.setNowPlaying(trackA, 'playing');

    sampler.handleNotification({ type: 'playbackStateChanged' });
    sampler.handleNotification({ type: 'nowPlayingItemChanged' });

    expect(events).toHaveLength(1);
  });

  it('should report a cleared item as a track change to nothing', () => {
    sampler.start();
    player.setNowPlaying(trackA, 'playing');

    player.setNowPlaying(null, 'stopped');

    expect(events[1]).toEqual({
      type: 'trackChanged',
      track: null,
      isPlaying: false,
    });
  });

  it('should stop listening to the player after stop', () => {
    sampler.start();
    sampler.stop();

    player.setNowPlaying(trackA, 'playing');

    expect(sampler.isRunning()).toBe(false);
    expect(events).toEqual([]);
  });
});
