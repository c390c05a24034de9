import type { RecordStore, ScheduleProvider, UpsertOutcome } from '../types/index.js';
import { slateSnapshotPath, writeSnapshot } from '../csv/snapshot.js';
import { toSlateEntries } from '../schedule/mlb-schedule.js';
import { upsertRecord } from '../store/upsert.js';
import { logger } from '../utils/logger.js';
import { slateRecord } from './records.js';

export interface DailyRunDeps {
  schedule: ScheduleProvider;
  store: RecordStore;
  snapshotDir: string;
}

export interface RunReport {
  gameDate: string;
  /** Snapshot written, or null when there was nothing to write */
  snapshotPath: string | null;
  outcomes: UpsertOutcome[];
}

/**
 * Fetch the day's schedule, snapshot it, and upsert each game with empty
 * lines and picks. Games are upserted one at a time, in slate order.
 */
export async function runDaily(deps: DailyRunDeps, gameDate: string): Promise<RunReport> {
  const log = logger.child({ mode: 'daily', date: gameDate });

  const raw = await deps.schedule.fetchGames(gameDate);
  const records = toSlateEntries(gameDate, raw).map((entry) =>
    slateRecord(entry, undefined, deps.schedule.name),
  );

  if (records.length === 0) {
    log.info('No MLB games found for this date');
    return { gameDate, snapshotPath: null, outcomes: [] };
  }

  const snapshotPath = slateSnapshotPath(deps.snapshotDir, gameDate);
  writeSnapshot(snapshotPath, records);
  log.info({ path: snapshotPath, count: records.length }, 'Wrote slate snapshot');

  const outcomes: UpsertOutcome[] = [];
  for (const record of records) {
    const outcome = await upsertRecord(deps.store, record);
    log.info(
      { key: outcome.key, status: outcome.status, id: outcome.id },
      `${record.slate.away} @ ${record.slate.home} ${outcome.status}`,
    );
    outcomes.push(outcome);
  }

  return { gameDate, snapshotPath, outcomes };
}
