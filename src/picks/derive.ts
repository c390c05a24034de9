import type { GamePicks, MoneylineSide, RunLineSide, TotalSide } from '../types/pick.js';
import type { MarketQuote } from '../types/market.js';
import type { SlateEntry } from '../types/slate.js';
import { edgeToConfidence, impliedProbability, removeVig } from './odds-math.js';

/** Below this no-vig edge a total is not worth a side. */
export const TOTAL_EDGE_THRESHOLD = 0.02;
export const NO_EDGE_CONFIDENCE = 2;
/** Favorite probability needed before laying the run line. */
export const RUN_LINE_FAVORITE_THRESHOLD = 0.62;

export interface MoneylinePick {
  side: MoneylineSide;
  confidence: number;
  /** No-vig probability of the side picked */
  favoriteProbability: number;
}

export interface TotalPick {
  side: TotalSide;
  label: string;
  confidence: number;
}

export interface RunLinePick {
  side: RunLineSide;
  confidence: number;
}

function noVigMoneyline(mlHome: number, mlAway: number): { home: number; away: number } {
  const [home, away] = removeVig(impliedProbability(mlHome), impliedProbability(mlAway));
  return { home, away };
}

export function pickMoneyline(mlHome: number, mlAway: number): MoneylinePick {
  const { home, away } = noVigMoneyline(mlHome, mlAway);
  // ties go to the home side
  const favoriteProbability = home >= away ? home : away;
  return {
    side: home >= away ? 'HOME ML' : 'AWAY ML',
    confidence: edgeToConfidence(Math.abs(favoriteProbability - 0.5)),
    favoriteProbability,
  };
}

export function pickTotal(total: number, overPrice: number, underPrice: number): TotalPick {
  const [over, under] = removeVig(impliedProbability(overPrice), impliedProbability(underPrice));
  const edge = Math.abs(over - 0.5);

  if (edge < TOTAL_EDGE_THRESHOLD) {
    return { side: 'none', label: 'No Edge', confidence: NO_EDGE_CONFIDENCE };
  }
  if (over > under) {
    return { side: 'over', label: `Over ${total}`, confidence: edgeToConfidence(edge) };
  }
  return { side: 'under', label: `Under ${total}`, confidence: edgeToConfidence(edge) };
}

/**
 * Run line needs a bigger edge than the straight moneyline. Short of the
 * threshold the underdog gets the cushion, one point less confident.
 */
export function pickRunLine(favoriteProbability: number): RunLinePick {
  if (favoriteProbability >= RUN_LINE_FAVORITE_THRESHOLD) {
    return { side: 'FAV -1.5', confidence: edgeToConfidence(favoriteProbability - 0.5) };
  }
  return {
    side: 'DOG +1.5',
    confidence: Math.max(
      NO_EDGE_CONFIDENCE,
      edgeToConfidence(RUN_LINE_FAVORITE_THRESHOLD - favoriteProbability) - 1,
    ),
  };
}

/** All three picks for a game, labelled with the slate's team codes. */
export function derivePicks(game: SlateEntry, quote: MarketQuote): GamePicks {
  const ml = pickMoneyline(quote.mlHome, quote.mlAway);
  const homeFavored = ml.side === 'HOME ML';
  const favorite = homeFavored ? game.home : game.away;
  const underdog = homeFavored ? game.away : game.home;

  const total =
    quote.total === null
      ? { label: 'No Edge', confidence: NO_EDGE_CONFIDENCE }
      : pickTotal(quote.total, quote.overPrice, quote.underPrice);

  const rl = pickRunLine(ml.favoriteProbability);

  return {
    moneyline: { label: `${favorite} ML`, confidence: ml.confidence },
    total: { label: total.label, confidence: total.confidence },
    runLine: {
      label: rl.side === 'FAV -1.5' ? `${favorite} -1.5` : `${underdog} +1.5`,
      confidence: rl.confidence,
    },
  };
}
