// ============================================
// Library & play ledger
// ============================================

export type PlaySource = 'live' | 'counterSync';

export interface TrackRecord {
  id: string;
  title: string;
  artist: string;
  album?: string;
  durationSeconds: number;
  /** Plays counted by the system before tracking began (no timestamps). */
  baselineCounter: number;
  /** Last system play-counter value already accounted for. */
  lastSeenCounter: number;
  /**
   * Live plays included in `lastSeenCounter` that the system counter has
   * not shown yet. The system counts a play when the track ends.
   */
  pendingLiveCredits: number;
  lastLivePlayAt?: number;
  lastReconciledAt: number;
  /** Position in the most recent catalog enumeration */
  catalogOrder?: number;
  createdAt: number;
}

export interface PlayFact {
  id: string;
  trackId: string;
  timestamp: number;
  source: PlaySource;
  listenedSeconds?: number;
  trackDurationSeconds?: number;
  completionRatio?: number;
}

export type NewPlayFact = Omit<PlayFact, 'id'>;

export interface PlayQuery {
  trackId?: string;
  /** Inclusive lower bound (ms) */
  since?: number;
  /** Inclusive upper bound (ms) */
  until?: number;
  source?: PlaySource;
}

// ============================================
// Catalog & playback (external collaborators)
// ============================================

export interface CatalogTrack {
  id: string;
  title: string;
  artist: string;
  album?: string;
  durationSeconds: number;
  currentPlayCount: number;
}

export type PlaybackState =
  | 'playing'
  | 'paused'
  | 'stopped'
  | 'interrupted'
  | 'unknown';

export type PlayerNotification =
  | { type: 'nowPlayingItemChanged' }
  | { type: 'playbackStateChanged' };

// ============================================
// Reconciliation & sync
// ============================================

export interface ReconciliationReport {
  tracksProcessed: number;
  tracksCreated: number;
  playsCreated: number;
  countersReset: number;
  batchesCommitted: number;
  startedAt: number;
  completedAt: number;
}

export interface TrackReconciliation {
  trackId: string;
  created: boolean;
  delta: number;
  playsCreated: number;
  /** Pending live plays the system counter now shows */
  livePlaysConfirmed: number;
  counterReset: boolean;
}

export interface ReconciliationProgress {
  processed: number;
  total: number;
  currentTitle?: string;
  /** From the average time per track so far */
  estimatedSecondsRemaining: number;
}

export interface EngineState {
  hasSeededLibrary: boolean;
  lastFullSyncAt: number | null;
  lastQuickSyncAt: number | null;
}

export type SyncMode = 'full' | 'quick' | 'skipped';

export interface SyncOutcome {
  mode: SyncMode;
  report: ReconciliationReport | null;
  quickResult?: TrackReconciliation | null;
}

export interface SyncStatus {
  status: 'idle' | 'syncing' | 'completed' | 'error';
  mode?: SyncMode;
  lastSyncTimestamp?: number;
  playsCreated?: number;
  error?: string;
}

// ============================================
// Charts
// ============================================

export type ChartPeriod = 'allTime' | 'week' | 'month' | 'year';

export const CHART_PERIODS: readonly ChartPeriod[] = [
  'allTime',
  'week',
  'month',
  'year',
];

export type RankMovement =
  | { kind: 'new' }
  | { kind: 'unchanged' }
  | { kind: 'up'; positions: number }
  | { kind: 'down'; positions: number };

export interface RankedTrack {
  rank: number;
  trackId: string;
  title: string;
  artist: string;
  album?: string;
  playCount: number;
  movement: RankMovement;
}

export interface RankChange {
  trackId: string;
  period: ChartPeriod;
  previousRank: number;
  newRank: number;
}

/** Last assigned rank per track, per chart view. */
export type RankBookData = Record<ChartPeriod, Record<string, number>>;

export interface SourceBreakdown {
  live: number;
  counterSync: number;
  baseline: number;
  total: number;
}

export interface MaintenanceReport {
  playsPruned: number;
  tracksRemoved: number;
}

export interface ResetReport {
  tracksRemoved: number;
  playsRemoved: number;
}
