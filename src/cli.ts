import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig } from './config.js';
import { createSql } from './db/pool.js';
import { runDaily } from './pipeline/daily-run.js';
import { DEFAULT_ODDS_FILE, runOddsIngest } from './pipeline/odds-run.js';
import { MlbStatsScheduleProvider } from './schedule/mlb-schedule.js';
import { PostgresRecordStore } from './store/postgres-store.js';
import type { ScheduleProvider } from './types/index.js';
import { isIsoDate, todayDateString } from './utils/date.js';
import { logger } from './utils/logger.js';

export interface CliRuntime {
  env: NodeJS.ProcessEnv;
  writeErr: (message: string) => void;
  schedule: ScheduleProvider;
}

const defaultRuntime = (): CliRuntime => ({
  env: process.env,
  writeErr: (message) => process.stderr.write(message),
  schedule: new MlbStatsScheduleProvider(),
});

function parseDateOption(value: string): string {
  if (!isIsoDate(value)) throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  return value;
}

export function createProgram(runtime: CliRuntime): Command {
  /** Open the store, run one mode, and always release the connection. */
  async function withStore<T>(fn: (store: PostgresRecordStore, snapshotDir: string) => Promise<T>): Promise<T> {
    const config = loadConfig(runtime.env);
    logger.level = config.LOG_LEVEL;
    const sql = createSql(config.DATABASE_URL);
    try {
      return await fn(new PostgresRecordStore(sql, config.RECORD_TABLE), config.SNAPSHOT_DIR);
    } finally {
      await sql.end();
    }
  }

  const program = new Command()
    .name('mlb-picks')
    .description('Daily MLB slate ingest and odds-based picks')
    .exitOverride()
    .configureOutput({ writeErr: runtime.writeErr });

  program
    .command('daily', { isDefault: true })
    .description("Fetch the day's schedule, snapshot it and upsert every game")
    .option('-d, --date <yyyy-mm-dd>', 'slate date (default: today)', parseDateOption)
    .action(async (opts: { date?: string }) => {
      const gameDate = opts.date ?? todayDateString();
      const report = await withStore((store, snapshotDir) =>
        runDaily({ schedule: runtime.schedule, store, snapshotDir }, gameDate),
      );
      logger.info({ date: gameDate, records: report.outcomes.length }, 'Daily run complete');
    });

  program
    .command('odds')
    .description("Join an odds CSV onto the day's slate, derive picks and upsert")
    .argument('[file]', 'odds CSV path', DEFAULT_ODDS_FILE)
    .option('-d, --date <yyyy-mm-dd>', 'slate date (default: today)', parseDateOption)
    .action(async (file: string, opts: { date?: string }) => {
      const gameDate = opts.date ?? todayDateString();
      const report = await withStore((store, snapshotDir) =>
        runOddsIngest({ store, snapshotDir }, gameDate, file),
      );
      logger.info({ date: gameDate, records: report.outcomes.length }, 'Odds run complete');
    });

  return program;
}

/** Run the CLI against user arguments (no node/script prefix). Resolves to the exit code. */
export async function runCli(args: string[], runtime: CliRuntime = defaultRuntime()): Promise<number> {
  try {
    await createProgram(runtime).parseAsync(args, { from: 'user' });
    return 0;
  } catch (err: unknown) {
    // commander has already printed usage errors
    if (err instanceof CommanderError) return err.exitCode;
    logger.fatal(err, 'Run failed');
    runtime.writeErr(`${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
