import type { MarketQuote } from '../types/market.js';
import type { SlateEntry } from '../types/slate.js';
import { gameKeyOf } from './game-key.js';

export interface JoinedGame {
  key: string;
  slate: SlateEntry;
  quote: MarketQuote | null;
}

export interface JoinResult {
  games: JoinedGame[];
  /** Quotes whose key is not on the slate */
  unmatchedQuotes: number;
  /** Slate entries dropped because an earlier entry had the same key */
  duplicateSlateEntries: number;
}

/**
 * Join quotes onto the slate by game key. The slate drives the output:
 * one game per distinct slate key, never a row the slate doesn't have.
 */
export function joinSlateWithQuotes(slate: SlateEntry[], quotes: MarketQuote[]): JoinResult {
  const quotesByKey = new Map<string, MarketQuote>();
  for (const quote of quotes) {
    // last row wins
    quotesByKey.set(gameKeyOf(quote), quote);
  }

  const games: JoinedGame[] = [];
  const seen = new Set<string>();
  let duplicateSlateEntries = 0;

  for (const entry of slate) {
    const key = gameKeyOf(entry);
    if (seen.has(key)) {
      duplicateSlateEntries++;
      continue;
    }
    seen.add(key);
    games.push({ key, slate: entry, quote: quotesByKey.get(key) ?? null });
  }

  let unmatchedQuotes = 0;
  for (const key of quotesByKey.keys()) {
    if (!seen.has(key)) unmatchedQuotes++;
  }

  return { games, unmatchedQuotes, duplicateSlateEntries };
}
