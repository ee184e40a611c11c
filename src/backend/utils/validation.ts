/**
 * Input validation for values arriving over the local HTTP bridge
 */

import {
  CatalogTrack,
  CHART_PERIODS,
  ChartPeriod,
  PlaybackState,
} from '../../shared/types';

const PLAYBACK_STATES: readonly PlaybackState[] = [
  'playing',
  'paused',
  'stopped',
  'interrupted',
  'unknown',
];

/**
 * Validates a library track identifier.
 * Allows alphanumeric, underscore, hyphen, dot and colon characters
 * (opaque ids such as `library:track.42`). Length between 1-128 characters
 */
export function validateTrackId(trackId: unknown): trackId is string {
  const TRACK_ID_PATTERN = /^[a-zA-Z0-9_.:-]{1,128}$/;
  return typeof trackId === 'string' && TRACK_ID_PATTERN.test(trackId);
}

export function isChartPeriod(value: unknown): value is ChartPeriod {
  return CHART_PERIODS.some(period => period === value);
}

export function isPlaybackState(value: unknown): value is PlaybackState {
  return PLAYBACK_STATES.some(state => state === value);
}

/**
 * Validates that a value is a non-negative finite number
 */
export function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a catalog track pushed by the OS bridge (or read from the catalog
 * snapshot). Returns null when a required field is missing or malformed.
 * A missing or invalid duration is kept as 0 (unknown).
 */
export function parseCatalogTrack(value: unknown): CatalogTrack | null {
  if (!isRecord(value)) return null;

  const { id, title, artist, album, durationSeconds, currentPlayCount } =
    value;

  if (!validateTrackId(id)) return null;
  if (typeof title !== 'string' || typeof artist !== 'string') return null;
  if (!isNonNegativeNumber(currentPlayCount)) return null;

  return {
    id,
    title,
    artist,
    album: typeof album === 'string' ? album : undefined,
    durationSeconds: isNonNegativeNumber(durationSeconds)
      ? durationSeconds
      : 0,
    currentPlayCount: Math.floor(currentPlayCount),
  };
}
