import fs from 'node:fs';
import path from 'node:path';
import Papa from 'papaparse';
import type { PredictionRecord } from '../types/record.js';
import type { SlateEntry } from '../types/slate.js';
import { normalizeTeam } from '../pipeline/team-resolver.js';

export const SNAPSHOT_COLUMNS = [
  'game_date', 'away', 'home', 'start_et', 'away_p', 'home_p',
  'ml_home', 'ml_away', 'total',
  'pick_ml', 'conf_ml', 'pick_tot', 'conf_tot', 'pick_rl', 'conf_rl',
  'box_link', 'notes', 'sources',
] as const;

export type SnapshotColumn = (typeof SNAPSHOT_COLUMNS)[number];
export type SnapshotRow = Record<SnapshotColumn, string>;

export function slateSnapshotPath(dir: string, gameDate: string): string {
  return path.join(dir, `slate_${gameDate}.csv`);
}

export function predictionsSnapshotPath(dir: string, gameDate: string): string {
  return path.join(dir, `predictions_${gameDate}.csv`);
}

function cell(value: string | number | null | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

export function toSnapshotRow(record: PredictionRecord): SnapshotRow {
  const { slate, market, picks } = record;
  return {
    game_date: slate.gameDate,
    away: slate.away,
    home: slate.home,
    start_et: slate.startEt,
    away_p: slate.awayPitcher,
    home_p: slate.homePitcher,
    ml_home: cell(market?.mlHome),
    ml_away: cell(market?.mlAway),
    total: cell(market?.total),
    pick_ml: cell(picks?.moneyline.label),
    conf_ml: cell(picks?.moneyline.confidence),
    pick_tot: cell(picks?.total.label),
    conf_tot: cell(picks?.total.confidence),
    pick_rl: cell(picks?.runLine.label),
    conf_rl: cell(picks?.runLine.confidence),
    box_link: slate.boxLink,
    notes: record.notes,
    sources: record.sources,
  };
}

export function serializeSnapshot(records: PredictionRecord[]): string {
  return Papa.unparse(
    {
      fields: [...SNAPSHOT_COLUMNS],
      data: records.map((r) => {
        const row = toSnapshotRow(r);
        return SNAPSHOT_COLUMNS.map((col) => row[col]);
      }),
    },
    { newline: '\n' },
  );
}

/**
 * Write records to a CSV snapshot, creating the directory if needed.
 * Returns false without touching disk when there is nothing to write.
 */
export function writeSnapshot(filePath: string, records: PredictionRecord[]): boolean {
  if (records.length === 0) return false;
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${serializeSnapshot(records)}\n`, 'utf-8');
  return true;
}

export function snapshotExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/** Slate entries from snapshot CSV text. Team codes are re-normalized. */
export function parseSlateSnapshot(text: string): SlateEntry[] {
  const { data } = Papa.parse<Partial<SnapshotRow>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  return data.map((r) => ({
    gameDate: (r.game_date ?? '').trim(),
    away: normalizeTeam(r.away ?? ''),
    home: normalizeTeam(r.home ?? ''),
    startEt: r.start_et ?? '',
    awayPitcher: r.away_p ?? '',
    homePitcher: r.home_p ?? '',
    boxLink: r.box_link ?? '',
  }));
}

export function readSlateSnapshot(filePath: string): SlateEntry[] {
  return parseSlateSnapshot(fs.readFileSync(filePath, 'utf-8'));
}
