import { logger } from '../logger.js';
import { describeRecord, isTrackLike, type SnapshotRecord } from '../snapshot/types.js';
import { foldString, tokenSetRatio } from './similarity.js';
import type { MatchCandidate, MatchOptions, MatchResult, MatchVia, ScoredCandidate } from './types.js';

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  acceptThreshold: 0.85,
  minMargin: 0.05,
  durationToleranceSeconds: 3
};

const ISRC_SCORE = 1;
const EXACT_SCORE = 0.95;
// Fuzzy scores stay below an exact match on the same fields
const FUZZY_CEILING = 0.9;
const TITLE_WEIGHT = 0.6;
const ARTIST_WEIGHT = 0.4;
const DURATION_BONUS = 0.05;
const DURATION_PENALTY = 0.25;

const round = (value: number): number => Math.round(value * 10000) / 10000;

const clamp = (value: number): number => Math.min(1, Math.max(0, value));

interface CandidateScore extends ScoredCandidate {
  via: Exclude<MatchVia, 'isrc'>;
}

const durationAdjustment = (
  record: SnapshotRecord,
  candidate: MatchCandidate,
  toleranceSeconds: number
): number => {
  if (!isTrackLike(record.kind) || record.durationSeconds === undefined || candidate.durationSeconds === undefined) {
    return 0;
  }
  const difference = Math.abs(record.durationSeconds - candidate.durationSeconds);
  return difference <= toleranceSeconds ? DURATION_BONUS : -DURATION_PENALTY;
};

/**
 * Score one candidate in [0, 1]. Title and artist decide the base score
 * (exact after normalization, otherwise token-set similarity); for tracks a
 * known duration then nudges it up or pulls it down.
 */
export const scoreCandidate = (
  record: SnapshotRecord,
  candidate: MatchCandidate,
  options: MatchOptions = DEFAULT_MATCH_OPTIONS
): CandidateScore => {
  const exact =
    foldString(record.title) === foldString(candidate.title) &&
    foldString(record.primaryArtistName) === foldString(candidate.artistName);

  const base = exact
    ? EXACT_SCORE
    : FUZZY_CEILING *
      (TITLE_WEIGHT * tokenSetRatio(record.title, candidate.title) +
        ARTIST_WEIGHT * tokenSetRatio(record.primaryArtistName, candidate.artistName));

  const score = round(clamp(base + durationAdjustment(record, candidate, options.durationToleranceSeconds)));

  return { candidate, score, via: exact ? 'exact' : 'fuzzy' };
};

const findIsrcMatch = (record: SnapshotRecord, candidates: MatchCandidate[]): MatchCandidate | undefined => {
  if (!isTrackLike(record.kind) || !record.isrc) {
    return undefined;
  }
  const isrc = record.isrc.trim().toUpperCase();
  return candidates.find(candidate => candidate.isrc?.trim().toUpperCase() === isrc);
};

/**
 * Pick the destination entity for a snapshot record, or explain why not.
 *
 * Matched requires the best score to reach acceptThreshold and to beat the
 * runner-up by at least minMargin; an ISRC hit is accepted outright.
 * Pure: the same inputs always give the same result.
 */
export const resolve = (
  record: SnapshotRecord,
  candidates: MatchCandidate[],
  options: MatchOptions = DEFAULT_MATCH_OPTIONS
): MatchResult => {
  if (candidates.length === 0) {
    return { status: 'not-found' };
  }

  const isrcMatch = findIsrcMatch(record, candidates);
  if (isrcMatch) {
    logger.debug(
      { record: describeRecord(record), destinationEntityId: isrcMatch.destinationEntityId, isrc: record.isrc },
      'matched by isrc'
    );
    return { status: 'matched', candidate: isrcMatch, score: ISRC_SCORE, via: 'isrc' };
  }

  // Array.prototype.sort is stable: equal scores keep the destination's ranking
  const scored = candidates
    .map(candidate => scoreCandidate(record, candidate, options))
    .sort((a, b) => b.score - a.score);

  const [best, second] = scored;

  if (best.score < options.acceptThreshold) {
    return { status: 'not-found', bestScore: best.score };
  }

  let margin: number | undefined;
  if (second) {
    margin = round(best.score - second.score);
    if (margin < options.minMargin) {
      const topCandidates = scored
        .filter(entry => entry.score >= options.acceptThreshold && round(best.score - entry.score) < options.minMargin)
        .map(({ candidate, score }) => ({ candidate, score }));

      logger.debug(
        {
          record: describeRecord(record),
          candidates: topCandidates.map(entry => `${entry.candidate.destinationEntityId}:${entry.score}`)
        },
        'ambiguous match'
      );
      return { status: 'ambiguous', topCandidates };
    }
  }

  logger.debug(
    {
      record: describeRecord(record),
      match: `${best.candidate.artistName} - ${best.candidate.title}`,
      score: best.score,
      margin,
      via: best.via
    },
    'found match'
  );

  return { status: 'matched', candidate: best.candidate, score: best.score, margin, via: best.via };
};
