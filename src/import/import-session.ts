import { logger as rootLogger, type Logger } from '../logger.js';
import { AuthorizationError, describeError } from '../errors.js';
import { describeRecord, type SnapshotRecord } from '../snapshot/types.js';
import type { CandidateSearchAdapter } from './candidate-search.js';
import { DEFAULT_MATCH_OPTIONS, resolve } from './matcher.js';
import type { MutationApplier, PlaylistMappings } from './mutation-applier.js';
import type { OutcomeSink } from './outcome-log.js';
import type { ImportOutcome, ImportReport, MatchOptions, OutcomeCounts } from './types.js';

export interface ImportSessionDependencies {
  search: Pick<CandidateSearchAdapter, 'search'>;
  applier: Pick<MutationApplier, 'apply'>;
  sink?: OutcomeSink;
  matchOptions?: MatchOptions;
  logger?: Logger;
}

export interface RunOptions {
  /** Checked between records; the record in flight always finishes */
  signal?: AbortSignal;
}

export const countOutcomes = (outcomes: readonly ImportOutcome[]): OutcomeCounts => {
  const counts: OutcomeCounts = { Imported: 0, AlreadyPresent: 0, Skipped: 0, Failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
};

/** Records that were skipped or failed, for review and re-import */
export const unresolvedRecords = (outcomes: readonly ImportOutcome[]): SnapshotRecord[] =>
  outcomes
    .filter(outcome => outcome.status === 'Skipped' || outcome.status === 'Failed')
    .map(outcome => outcome.record);

/**
 * Replays a snapshot against the destination: search, match and apply each
 * record in order, one at a time. A record's failure is recorded and the run
 * moves on; only an authorization failure ends the run early.
 */
export class ImportSession {
  private readonly search: Pick<CandidateSearchAdapter, 'search'>;
  private readonly applier: Pick<MutationApplier, 'apply'>;
  private readonly sink?: OutcomeSink;
  private readonly matchOptions: MatchOptions;
  private readonly logger: Logger;

  constructor(deps: ImportSessionDependencies) {
    this.search = deps.search;
    this.applier = deps.applier;
    this.sink = deps.sink;
    this.matchOptions = deps.matchOptions ?? DEFAULT_MATCH_OPTIONS;
    this.logger = deps.logger ?? rootLogger;
  }

  async run(records: readonly SnapshotRecord[], options: RunOptions = {}): Promise<ImportReport> {
    const outcomes: ImportOutcome[] = [];
    const playlists: PlaylistMappings = new Map();
    let status: ImportReport['status'] = 'completed';
    let abortReason: string | undefined;

    const progressInterval = Math.max(1, Math.floor(records.length / 20)); // Report every 5%
    this.logger.info({ totalRecords: records.length }, 'starting import');

    for (const record of records) {
      if (options.signal?.aborted) {
        status = 'cancelled';
        this.logger.warn({ processed: outcomes.length, total: records.length }, 'import cancelled');
        break;
      }

      let outcome: ImportOutcome;
      try {
        outcome = await this.processRecord(record, playlists);
      } catch (error) {
        if (error instanceof AuthorizationError) {
          status = 'aborted';
          abortReason = describeError(error);
        }
        this.logger.error({ record: describeRecord(record), error: describeError(error) }, 'failed to import record');
        outcome = { record, status: 'Failed', reason: describeError(error) };
      }

      outcomes.push(outcome);
      this.writeOutcome(outcome);

      if (outcomes.length % progressInterval === 0 || outcomes.length === records.length) {
        this.logger.info(
          {
            processed: outcomes.length,
            total: records.length,
            progress: `${((outcomes.length / records.length) * 100).toFixed(1)}%`
          },
          'import progress'
        );
      }

      if (status === 'aborted') {
        this.logger.error({ reason: abortReason, processed: outcomes.length }, 'import aborted');
        break;
      }
    }

    const counts = countOutcomes(outcomes);
    this.logger.info({ status, ...counts }, 'import finished');

    return { status, outcomes, counts, abortReason };
  }

  /**
   * A failed log write is reported and the run goes on; the outcome is still
   * in the returned report.
   */
  private writeOutcome(outcome: ImportOutcome): void {
    if (!this.sink) {
      return;
    }
    try {
      this.sink.write(outcome);
    } catch (error) {
      this.logger.error(
        { record: describeRecord(outcome.record), error: describeError(error) },
        'failed to write outcome log entry'
      );
    }
  }

  private async processRecord(record: SnapshotRecord, playlists: PlaylistMappings): Promise<ImportOutcome> {
    const candidates = await this.search.search(record);
    const match = resolve(record, candidates, this.matchOptions);
    return this.applier.apply(record, match, playlists);
  }
}
