import type { SnapshotRecord } from '../snapshot/types.js';

/** A destination-catalog search hit considered for a snapshot record */
export interface MatchCandidate {
  destinationEntityId: string;
  title: string;
  artistName: string;
  albumName?: string;
  durationSeconds?: number;
  isrc?: string;
}

export interface ScoredCandidate {
  candidate: MatchCandidate;
  score: number;
}

export type MatchVia = 'isrc' | 'exact' | 'fuzzy';

export type MatchResult =
  | { status: 'matched'; candidate: MatchCandidate; score: number; margin?: number; via: MatchVia }
  | { status: 'ambiguous'; topCandidates: ScoredCandidate[] }
  | { status: 'not-found'; bestScore?: number };

export interface MatchOptions {
  /** Minimum score for a candidate to be accepted */
  acceptThreshold: number;
  /** Required gap between the best and second-best score */
  minMargin: number;
  durationToleranceSeconds: number;
}

export const IMPORT_STATUSES = ['Imported', 'AlreadyPresent', 'Skipped', 'Failed'] as const;

export type ImportStatus = (typeof IMPORT_STATUSES)[number];

export interface ImportOutcome {
  record: SnapshotRecord;
  status: ImportStatus;
  /** Always set for Skipped and Failed */
  reason?: string;
  /** Set for Imported and AlreadyPresent */
  destinationEntityId?: string;
  score?: number;
}

export type OutcomeCounts = Record<ImportStatus, number>;

export interface ImportReport {
  status: 'completed' | 'cancelled' | 'aborted';
  outcomes: ImportOutcome[];
  counts: OutcomeCounts;
  abortReason?: string;
}

export interface PlaylistMapping {
  destinationPlaylistId: string;
  /** Destination entity ids already in the playlist */
  entityIds: Set<string>;
}
