/** Market lines for one game, American odds throughout. */
export interface MarketQuote {
  gameDate: string;
  away: string;
  home: string;
  mlHome: number;
  mlAway: number;
  total: number | null;
  overPrice: number;
  underPrice: number;
}

export type OddsRowSkipReason = 'missing_game_fields' | 'bad_moneyline';

export interface SkippedOddsRow {
  /** 1-based data row number, header excluded */
  row: number;
  reason: OddsRowSkipReason;
}
