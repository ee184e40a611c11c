/**
 * Fraction of a track that must be heard before a listen counts as a play.
 */
export const COMPLETION_THRESHOLD = 0.5;

function hasKnownDuration(trackDurationSeconds: number): boolean {
  return Number.isFinite(trackDurationSeconds) && trackDurationSeconds > 0;
}

/**
 * Listened time divided by track duration. 0 when the duration is unknown.
 */
export function completionRatio(
  listenedSeconds: number,
  trackDurationSeconds: number
): number {
  if (!hasKnownDuration(trackDurationSeconds)) {
    return 0;
  }
  return listenedSeconds / trackDurationSeconds;
}

/**
 * Whether a listen counts as a completed play. The ratio is the only
 * criterion: no absolute minimum and no cap. Tracks with an unknown (zero or
 * invalid) duration never complete.
 */
export function isComplete(
  listenedSeconds: number,
  trackDurationSeconds: number
): boolean {
  if (!hasKnownDuration(trackDurationSeconds)) {
    return false;
  }
  return (
    completionRatio(listenedSeconds, trackDurationSeconds) >=
    COMPLETION_THRESHOLD
  );
}
