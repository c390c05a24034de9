import { describe, it, expect } from 'vitest';
import { gameKeyOf, makeGameKey } from '../../src/pipeline/game-key.js';

describe('makeGameKey', () => {
  it('should join date, away and home with pipes', () => {
    expect(makeGameKey('2025-08-13', 'NYM', 'ATL')).toBe('2025-08-13|NYM|ATL');
  });

  it('should be order-sensitive', () => {
    expect(makeGameKey('2025-08-13', 'NYM', 'ATL')).not.toBe(makeGameKey('2025-08-13', 'ATL', 'NYM'));
  });

  it('should produce the same key from any record shape', () => {
    const slate = { gameDate: '2025-08-13', away: 'AZ', home: 'SF', startEt: '9:45 PM' };
    const quote = { gameDate: '2025-08-13', away: 'AZ', home: 'SF', mlHome: -120, mlAway: 110 };
    expect(gameKeyOf(slate)).toBe(gameKeyOf(quote));
  });
});
