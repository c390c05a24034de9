export type MoneylineSide = 'HOME ML' | 'AWAY ML';
export type TotalSide = 'over' | 'under' | 'none';
export type RunLineSide = 'FAV -1.5' | 'DOG +1.5';

/** A rendered recommendation plus its 1-10 confidence. */
export interface Pick {
  label: string;
  confidence: number;
}

export interface GamePicks {
  moneyline: Pick;
  total: Pick;
  runLine: Pick;
}
