import { describe, it, expect } from 'vitest';
import { joinSlateWithQuotes } from '../../src/pipeline/join.js';
import type { MarketQuote } from '../../src/types/market.js';
import type { SlateEntry } from '../../src/types/slate.js';

function entry(away: string, home: string, gameDate = '2025-08-13'): SlateEntry {
  return { gameDate, away, home, startEt: '7:05 PM', awayPitcher: '', homePitcher: '', boxLink: '' };
}

function quote(away: string, home: string, mlHome = -120, gameDate = '2025-08-13'): MarketQuote {
  return { gameDate, away, home, mlHome, mlAway: 100, total: 8.5, overPrice: -110, underPrice: -110 };
}

describe('joinSlateWithQuotes', () => {
  it('should attach a matching quote by key', () => {
    const { games } = joinSlateWithQuotes([entry('NYM', 'ATL')], [quote('NYM', 'ATL')]);
    expect(games).toHaveLength(1);
    expect(games[0]?.key).toBe('2025-08-13|NYM|ATL');
    expect(games[0]?.quote?.mlHome).toBe(-120);
  });

  it('should emit a quote-less game when the odds have no row for it', () => {
    const { games } = joinSlateWithQuotes([entry('AAA', 'BBB')], [quote('NYM', 'ATL')]);
    expect(games).toEqual([
      { key: '2025-08-13|AAA|BBB', slate: entry('AAA', 'BBB'), quote: null },
    ]);
  });

  it('should drop quotes that are not on the slate', () => {
    const result = joinSlateWithQuotes(
      [entry('NYM', 'ATL')],
      [quote('NYM', 'ATL'), quote('LAD', 'SF'), quote('ATL', 'NYM'), quote('NYM', 'ATL', -120, '2025-08-14')],
    );
    expect(result.games.map((g) => g.key)).toEqual(['2025-08-13|NYM|ATL']);
    expect(result.unmatchedQuotes).toBe(3);
  });

  it('should keep the last quote when the feed repeats a key', () => {
    const { games } = joinSlateWithQuotes(
      [entry('NYM', 'ATL')],
      [quote('NYM', 'ATL', -120), quote('NYM', 'ATL', -135)],
    );
    expect(games).toHaveLength(1);
    expect(games[0]?.quote?.mlHome).toBe(-135);
  });

  it('should emit one game per distinct slate key', () => {
    const slate = [entry('NYM', 'ATL'), entry('LAD', 'SF'), entry('NYM', 'ATL')];
    const result = joinSlateWithQuotes(slate, []);
    expect(result.games.map((g) => g.key)).toEqual(['2025-08-13|NYM|ATL', '2025-08-13|LAD|SF']);
    expect(result.duplicateSlateEntries).toBe(1);
  });

  it('should return an empty join for an empty slate', () => {
    expect(joinSlateWithQuotes([], [quote('NYM', 'ATL')])).toEqual({
      games: [],
      unmatchedQuotes: 1,
      duplicateSlateEntries: 0,
    });
  });

  it('should preserve slate order', () => {
    const slate = [entry('TOR', 'BOS'), entry('NYM', 'ATL'), entry('LAD', 'SF')];
    const { games } = joinSlateWithQuotes(slate, [quote('LAD', 'SF'), quote('TOR', 'BOS')]);
    expect(games.map((g) => [g.slate.away, g.quote !== null])).toEqual([
      ['TOR', true],
      ['NYM', false],
      ['LAD', true],
    ]);
  });
});
