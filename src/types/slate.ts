/** Raw game as returned by a schedule provider, before team normalization. */
export interface RawGameDescriptor {
  awayTeamRaw: string;
  homeTeamRaw: string;
  /** ISO timestamp of first pitch, if scheduled */
  startsAt: string | null;
  awayPitcher: string;
  homePitcher: string;
  boxLink: string;
}

/** One scheduled game on the slate. The authoritative side of every join. */
export interface SlateEntry {
  /** ISO date string, e.g. '2025-08-13' */
  gameDate: string;
  away: string;
  home: string;
  /** Eastern wall-clock start, e.g. '7:05 PM' */
  startEt: string;
  awayPitcher: string;
  homePitcher: string;
  boxLink: string;
}

export interface ScheduleProvider {
  readonly name: string;
  fetchGames(gameDate: string): Promise<RawGameDescriptor[]>;
}
