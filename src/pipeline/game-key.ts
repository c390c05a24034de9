/**
 * Composite key for one game on one day: `date|away|home`.
 * Callers pass canonical team codes; order matters.
 */
export function makeGameKey(gameDate: string, away: string, home: string): string {
  return `${gameDate}|${away}|${home}`;
}

export function gameKeyOf(game: { gameDate: string; away: string; home: string }): string {
  return makeGameKey(game.gameDate, game.away, game.home);
}
