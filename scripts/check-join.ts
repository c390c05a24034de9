/**
 * Preview how an odds file lines up with a slate snapshot, without touching the store.
 * Usage: npx tsx scripts/check-join.ts [odds.csv] [yyyy-mm-dd]
 */
import 'dotenv/config';
import { readOddsFile } from '../src/csv/odds-feed.js';
import { readSlateSnapshot, slateSnapshotPath, snapshotExists } from '../src/csv/snapshot.js';
import { joinSlateWithQuotes } from '../src/pipeline/join.js';
import { joinedRecord } from '../src/pipeline/records.js';
import { todayDateString } from '../src/utils/date.js';

const oddsPath = process.argv[2] ?? 'odds.csv';
const gameDate = process.argv[3] ?? todayDateString();
const slatePath = slateSnapshotPath(process.env['SNAPSHOT_DIR'] ?? './snapshots', gameDate);

if (!snapshotExists(slatePath)) {
  console.error(`Slate file not found: ${slatePath}`);
  process.exit(1);
}

const feed = readOddsFile(oddsPath);
const joined = joinSlateWithQuotes(readSlateSnapshot(slatePath), feed.quotes);

for (const game of joined.games) {
  const record = joinedRecord(game);
  const picks = record.picks
    ? `${record.picks.moneyline.label} (${record.picks.moneyline.confidence}) | ` +
      `${record.picks.total.label} (${record.picks.total.confidence}) | ` +
      `${record.picks.runLine.label} (${record.picks.runLine.confidence})`
    : 'no odds';
  console.log(`${game.key.padEnd(24)} ${picks}`);
}

console.log(
  `\n${joined.games.length} slate games, ` +
    `${joined.games.filter((g) => g.quote).length} with odds, ` +
    `${joined.unmatchedQuotes} odds rows off-slate, ${feed.skipped.length} unreadable`,
);
