import fs from 'node:fs';
import Papa from 'papaparse';
import type { MarketQuote, SkippedOddsRow } from '../types/market.js';
import { normalizeTeam } from '../pipeline/team-resolver.js';

/** Price assumed for an over or under that the feed leaves blank. */
export const STANDARD_TOTAL_PRICE = -110;

export const ODDS_COLUMNS = {
  gameDate: 'Game Date',
  away: 'Away Team',
  home: 'Home Team',
  mlHome: 'ML - Market Home',
  mlAway: 'ML - Market Away',
  total: 'Total (Market)',
  overPrice: 'Over Price',
  underPrice: 'Under Price',
} as const;

export interface OddsFeed {
  quotes: MarketQuote[];
  skipped: SkippedOddsRow[];
}

type OddsRow = Partial<Record<string, string>>;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(raw: string | undefined): number | null {
  const trimmed = raw?.trim() ?? '';
  // decimal only: Number() would also take hex, octal and binary literals
  if (!DECIMAL.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

function parseTotalPrices(row: OddsRow): { overPrice: number; underPrice: number } {
  const overRaw = row[ODDS_COLUMNS.overPrice] ?? '';
  const underRaw = row[ODDS_COLUMNS.underPrice] ?? '';
  const overPrice = overRaw === '' ? STANDARD_TOTAL_PRICE : parseNumber(overRaw);
  const underPrice = underRaw === '' ? STANDARD_TOTAL_PRICE : parseNumber(underRaw);

  // one bad price makes the pair untrustworthy
  if (overPrice === null || underPrice === null) {
    return { overPrice: STANDARD_TOTAL_PRICE, underPrice: STANDARD_TOTAL_PRICE };
  }
  return { overPrice, underPrice };
}

/**
 * Parse odds CSV text into market quotes. Rows without a date and both teams,
 * or with an unreadable moneyline, are skipped and reported; they never fail the feed.
 */
export function parseOddsCsv(text: string): OddsFeed {
  const { data } = Papa.parse<OddsRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  const quotes: MarketQuote[] = [];
  const skipped: SkippedOddsRow[] = [];

  data.forEach((row, i) => {
    const gameDate = (row[ODDS_COLUMNS.gameDate] ?? '').trim();
    const away = normalizeTeam(row[ODDS_COLUMNS.away] ?? '');
    const home = normalizeTeam(row[ODDS_COLUMNS.home] ?? '');
    if (!gameDate || !away || !home) {
      skipped.push({ row: i + 1, reason: 'missing_game_fields' });
      return;
    }

    const mlHome = parseNumber(row[ODDS_COLUMNS.mlHome]);
    const mlAway = parseNumber(row[ODDS_COLUMNS.mlAway]);
    if (mlHome === null || mlAway === null) {
      skipped.push({ row: i + 1, reason: 'bad_moneyline' });
      return;
    }

    quotes.push({
      gameDate,
      away,
      home,
      mlHome,
      mlAway,
      total: parseNumber(row[ODDS_COLUMNS.total]),
      ...parseTotalPrices(row),
    });
  });

  return { quotes, skipped };
}

export function readOddsFile(filePath: string): OddsFeed {
  return parseOddsCsv(fs.readFileSync(filePath, 'utf-8'));
}
