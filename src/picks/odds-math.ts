/**
 * American odds conversion and confidence scoring. Pure, no state.
 */

/**
 * Implied win probability of an American price.
 * Zero takes the underdog branch and comes out as 1.0.
 */
export function impliedProbability(americanOdds: number): number {
  if (americanOdds < 0) {
    return -americanOdds / (-americanOdds + 100);
  }
  return 100 / (americanOdds + 100);
}

/** Rescales a two-way pair so it sums to 1. A zero pair becomes a coin flip. */
export function removeVig(pA: number, pB: number): [number, number] {
  const sum = pA + pB;
  if (sum === 0) return [0.5, 0.5];
  return [pA / sum, pB / sum];
}

/** Round to nearest, halves to the even neighbour (4.5 -> 4, 5.5 -> 6). */
export function roundHalfEven(x: number): number {
  const r = Math.round(x);
  return Math.abs(x % 1) === 0.5 && r % 2 !== 0 ? r - 1 : r;
}

/**
 * Maps a probability edge over 50% to a 1-10 score:
 * 3 at no edge, ~6 at 5 points, ~8 at 10, 10 from 15 up.
 */
export function edgeToConfidence(edge: number): number {
  const e = edge < 0 ? 0 : edge;
  const score = 3 + (e / 0.05) * 1.5;
  return Math.max(1, Math.min(10, roundHalfEven(score)));
}
