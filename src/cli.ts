#!/usr/bin/env node
/**
 * Command line for exporting a Spotify library to snapshot files and
 * importing them into TIDAL
 */

import 'dotenv/config';
import { join } from 'path';
import { format } from 'date-fns';
import { importSettingsFrom, loadAppEnv, type AppEnv } from './config.js';
import { configureLogger, logger } from './logger.js';
import { connectSpotify, connectTidal } from './catalog/session.js';
import { EXPORT_KINDS, RECORD_KIND_FOR, exportLibrary, isExportKind, type ExportKind } from './export/exporter.js';
import { CandidateSearchAdapter } from './import/candidate-search.js';
import { ImportSession, unresolvedRecords } from './import/import-session.js';
import { MutationApplier } from './import/mutation-applier.js';
import { createFileOutcomeSink } from './import/outcome-log.js';
import { RateLimitedInvoker } from './import/rate-limited-invoker.js';
import { findLatestSnapshot, readSnapshotFile, writeSnapshotFile } from './snapshot/snapshot-file.js';
import { formatUserError } from './utils/error-formatter.js';

const EXIT_FAILURE = 1;
const EXIT_CANCELLED = 130;

const usage = `catalog-transfer - Move a Spotify library to TIDAL

Usage:
  catalog-transfer export [all|tracks|albums|artists|playlists]
      Export the Spotify library to CSV snapshots in EXPORT_DIR (default: all)
  catalog-transfer import <tracks|albums|artists|playlists> [file]
      Import a snapshot into TIDAL (default: latest export of that kind)
  catalog-transfer check
      Verify the Spotify and TIDAL credentials
  catalog-transfer --help
      Show this help

Configuration is read from the environment or .env (see .env.example).
Ctrl+C during an import stops after the current record.`;

const args = process.argv.slice(2);
const command = args[0];

const timestamp = (): string => format(new Date(), 'yyyyMMdd_HHmmss');

async function runExport(env: AppEnv, target: string | undefined): Promise<number> {
  let kinds: readonly ExportKind[];
  if (!target || target === 'all') {
    kinds = EXPORT_KINDS;
  } else if (isExportKind(target)) {
    kinds = [target];
  } else {
    console.error(`Error: Unknown export kind '${target}'`);
    console.error(`Expected one of: all, ${EXPORT_KINDS.join(', ')}`);
    return EXIT_FAILURE;
  }

  const settings = importSettingsFrom(env);
  const source = await connectSpotify(env);
  const invoker = new RateLimitedInvoker(settings.retry);
  const user = await invoker.invoke('spotify current user', () => source.whoami());
  console.log(`Exporting library of ${user.displayName}`);

  const summaries = await exportLibrary(source, kinds, { directory: env.EXPORT_DIR, invoker });
  for (const summary of summaries) {
    console.log(`  ${summary.kind}: ${summary.recordCount} records -> ${summary.path}`);
  }
  return 0;
}

async function runImport(env: AppEnv, target: string | undefined, file: string | undefined): Promise<number> {
  if (!target || !isExportKind(target)) {
    console.error('Error: Import kind required');
    console.error(`Usage: catalog-transfer import <${EXPORT_KINDS.join('|')}> [file]`);
    return EXIT_FAILURE;
  }

  const path = file ?? (await findLatestSnapshot(env.EXPORT_DIR, target));
  if (!path) {
    console.error(`Error: No ${target} snapshot found in ${env.EXPORT_DIR}`);
    console.error(`Run 'catalog-transfer export ${target}' first or pass a file`);
    return EXIT_FAILURE;
  }

  const records = await readSnapshotFile(path, { expectKind: RECORD_KIND_FOR[target] });
  console.log(`Importing ${records.length} ${target} from ${path}`);

  const settings = importSettingsFrom(env);
  const destination = connectTidal(env);
  const invoker = new RateLimitedInvoker(settings.retry);
  const user = await invoker.invoke('tidal current user', () => destination.whoami());
  logger.info({ user: user.displayName }, 'connected to tidal');

  const runTag = `import_${target}_${timestamp()}`;
  const logPath = join(env.OUTCOME_LOG_DIR, `${runTag}.log`);
  const sink = createFileOutcomeSink(logPath);

  const session = new ImportSession({
    search: new CandidateSearchAdapter(destination, invoker, settings.searchLimit),
    applier: new MutationApplier(destination, invoker),
    sink,
    matchOptions: settings.match
  });

  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(EXIT_CANCELLED);
    }
    logger.warn('cancelling after the current record (press Ctrl+C again to quit now)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const report = await session.run(records, { signal: controller.signal }).finally(() => {
    process.off('SIGINT', onSigint);
    return sink.close();
  });

  const { counts } = report;
  console.log(
    `Imported: ${counts.Imported}, already present: ${counts.AlreadyPresent}, ` +
      `skipped: ${counts.Skipped}, failed: ${counts.Failed}`
  );
  console.log(`Outcome log: ${logPath}`);

  const unresolved = unresolvedRecords(report.outcomes);
  if (unresolved.length > 0) {
    // Kept beside the log so it is never picked up as the latest export
    const reviewPath = join(env.OUTCOME_LOG_DIR, `${runTag}_unresolved.csv`);
    await writeSnapshotFile(reviewPath, unresolved);
    console.log(`Unresolved records (for review or re-import): ${reviewPath}`);
  }

  switch (report.status) {
    case 'completed':
      return 0;
    case 'cancelled':
      console.log(`Cancelled after ${report.outcomes.length} of ${records.length} records`);
      return EXIT_CANCELLED;
    case 'aborted':
      console.error(`Import aborted: ${report.abortReason ?? 'authorization failed'}`);
      console.error('Check TIDAL_ACCESS_TOKEN in .env; the session may have expired. Re-running skips what was already imported.');
      return EXIT_FAILURE;
  }
}

async function runCheck(env: AppEnv): Promise<number> {
  const invoker = new RateLimitedInvoker(importSettingsFrom(env).retry);
  let failures = 0;

  try {
    const source = await connectSpotify(env);
    const user = await invoker.invoke('spotify current user', () => source.whoami());
    console.log(`Spotify: connected as ${user.displayName}`);
  } catch (error) {
    failures++;
    console.error(`Spotify: ${formatUserError(error, 'connecting to Spotify')}`);
  }

  try {
    const destination = connectTidal(env);
    const user = await invoker.invoke('tidal current user', () => destination.whoami());
    console.log(`TIDAL: connected as ${user.displayName}`);
  } catch (error) {
    failures++;
    console.error(`TIDAL: ${formatUserError(error, 'connecting to TIDAL')}`);
  }

  return failures === 0 ? 0 : EXIT_FAILURE;
}

async function main(): Promise<number> {
  if (!command || command === '--help' || command === '-h' || command === 'help') {
    console.log(usage);
    return 0;
  }

  const env = loadAppEnv();
  configureLogger(env.LOG_LEVEL);

  switch (command) {
    case 'export':
      return runExport(env, args[1]);
    case 'import':
      return runImport(env, args[1], args[2]);
    case 'check':
      return runCheck(env);
  }

  console.error(`Error: Unknown command '${command}'`);
  console.log('\n' + usage);
  return EXIT_FAILURE;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.error({ err: error }, 'CLI execution failed');
    console.error(formatUserError(error, command === 'export' ? 'exporting from Spotify' : 'importing into TIDAL'));
    process.exitCode = EXIT_FAILURE;
  });
