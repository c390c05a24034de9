import type { PredictionRecord, RecordFields } from '../types/record.js';
import type { SlateEntry } from '../types/slate.js';
import { derivePicks } from '../picks/derive.js';
import { gameKeyOf } from './game-key.js';
import type { JoinedGame } from './join.js';

export const SCHEDULE_SOURCE = 'MLB Stats API';
export const SLATE_NOTES = 'Auto from MLB schedule; awaiting odds/model.';
export const JOINED_SOURCES = 'MLB Stats API + Odds CSV';
export const JOINED_NOTES = 'Joined slate + odds';

/** Record for a game with no market yet: empty lines, empty picks. */
export function slateRecord(
  entry: SlateEntry,
  notes: string = SLATE_NOTES,
  sources: string = SCHEDULE_SOURCE,
): PredictionRecord {
  return { key: gameKeyOf(entry), slate: entry, market: null, picks: null, notes, sources };
}

export function joinedRecord(game: JoinedGame): PredictionRecord {
  return {
    key: game.key,
    slate: game.slate,
    market: game.quote,
    picks: game.quote ? derivePicks(game.slate, game.quote) : null,
    notes: JOINED_NOTES,
    sources: JOINED_SOURCES,
  };
}

/** Full field set sent to the record store, before filtering to known fields. */
export function toStoreFields(record: PredictionRecord): RecordFields {
  const { slate, market, picks } = record;
  return {
    game_key: record.key,
    game_date: slate.gameDate,
    away_team: slate.away,
    home_team: slate.home,
    start_et: slate.startEt,
    away_pitcher: slate.awayPitcher,
    home_pitcher: slate.homePitcher,
    ml_home: market?.mlHome ?? null,
    ml_away: market?.mlAway ?? null,
    total_market: market?.total ?? null,
    pick_ml: picks?.moneyline.label ?? '',
    conf_ml: picks?.moneyline.confidence ?? null,
    pick_total: picks?.total.label ?? '',
    conf_total: picks?.total.confidence ?? null,
    pick_run_line: picks?.runLine.label ?? '',
    conf_run_line: picks?.runLine.confidence ?? null,
    box_link: slate.boxLink || null,
    notes: record.notes,
    sources: record.sources,
  };
}
