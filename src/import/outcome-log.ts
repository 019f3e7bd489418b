import pino from 'pino';
import type { ImportOutcome } from './types.js';

/** Receives every outcome of an import run, in order, as it is decided */
export interface OutcomeSink {
  write(outcome: ImportOutcome): void;
  close(): Promise<void>;
}

export interface OutcomeLogEntry {
  kind: string;
  sourceEntityId: string;
  title: string;
  status: string;
  reason?: string;
  destinationEntityId?: string;
  score?: number;
  playlist?: string;
}

export const toLogEntry = (outcome: ImportOutcome): OutcomeLogEntry => ({
  kind: outcome.record.kind,
  sourceEntityId: outcome.record.sourceEntityId,
  title: outcome.record.title,
  status: outcome.status,
  reason: outcome.reason,
  destinationEntityId: outcome.destinationEntityId,
  score: outcome.score,
  playlist: outcome.record.sourcePlaylistName
});

/**
 * Append outcomes to a file as JSON lines. Writes are synchronous so the log
 * is complete up to the last decided record even if the process is killed.
 */
export const createFileOutcomeSink = (path: string): OutcomeSink => {
  const destination = pino.destination({ dest: path, append: true, mkdir: true, sync: true });
  const log = pino({ base: undefined, timestamp: pino.stdTimeFunctions.isoTime }, destination);

  return {
    write: outcome => {
      log.info(toLogEntry(outcome), 'import outcome');
    },
    close: async () => {
      destination.end();
    }
  };
};
