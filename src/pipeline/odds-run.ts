import type { PredictionRecord, RecordStore, UpsertOutcome } from '../types/index.js';
import {
  predictionsSnapshotPath,
  readSlateSnapshot,
  slateSnapshotPath,
  snapshotExists,
  writeSnapshot,
} from '../csv/snapshot.js';
import { readOddsFile } from '../csv/odds-feed.js';
import { upsertRecord } from '../store/upsert.js';
import { logger } from '../utils/logger.js';
import type { RunReport } from './daily-run.js';
import { joinSlateWithQuotes } from './join.js';
import { joinedRecord } from './records.js';

export const DEFAULT_ODDS_FILE = 'odds.csv';

export class SlateMissingError extends Error {
  constructor(readonly slatePath: string) {
    super(`Slate file not found: ${slatePath}. Run the daily mode first.`);
    this.name = 'SlateMissingError';
  }
}

export interface OddsRunDeps {
  store: RecordStore;
  snapshotDir: string;
}

/**
 * Join an odds file onto the day's slate snapshot, derive picks and upsert
 * every slate game. Quotes for games not on the slate are dropped.
 */
export async function runOddsIngest(
  deps: OddsRunDeps,
  gameDate: string,
  oddsPath: string = DEFAULT_ODDS_FILE,
): Promise<RunReport> {
  const log = logger.child({ mode: 'odds', date: gameDate });

  const slatePath = slateSnapshotPath(deps.snapshotDir, gameDate);
  if (!snapshotExists(slatePath)) {
    throw new SlateMissingError(slatePath);
  }

  const slate = readSlateSnapshot(slatePath);
  const feed = readOddsFile(oddsPath);
  if (feed.skipped.length > 0) {
    log.warn(
      { count: feed.skipped.length, rows: feed.skipped.map((s) => `${s.row}:${s.reason}`) },
      'Skipped unreadable odds rows',
    );
  }

  const joined = joinSlateWithQuotes(slate, feed.quotes);
  if (joined.unmatchedQuotes > 0) {
    log.info({ count: joined.unmatchedQuotes }, 'Dropped odds rows with no slate game');
  }
  if (joined.duplicateSlateEntries > 0) {
    log.warn({ count: joined.duplicateSlateEntries }, 'Slate has repeated game keys, keeping the first');
  }

  const records: PredictionRecord[] = [];
  const outcomes: UpsertOutcome[] = [];
  for (const game of joined.games) {
    const record = joinedRecord(game);
    const outcome = await upsertRecord(deps.store, record);
    log.info(
      { key: outcome.key, status: outcome.status, id: outcome.id, hasOdds: game.quote !== null },
      `${record.slate.away} @ ${record.slate.home} ${outcome.status}`,
    );
    records.push(record);
    outcomes.push(outcome);
  }

  const outPath = predictionsSnapshotPath(deps.snapshotDir, gameDate);
  const wrote = writeSnapshot(outPath, records);
  if (wrote) log.info({ path: outPath, count: records.length }, 'Wrote predictions snapshot');

  return { gameDate, snapshotPath: wrote ? outPath : null, outcomes };
}
