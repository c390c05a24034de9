import { request } from 'undici';
import { z } from 'zod';
import type { RawGameDescriptor, ScheduleProvider, SlateEntry } from '../types/slate.js';
import { normalizeTeam } from '../pipeline/team-resolver.js';
import { toEasternTime } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const MLB_STATS_BASE = 'https://statsapi.mlb.com/api/v1';
const GAMEDAY_BASE = 'https://www.mlb.com/gameday';

const teamSchema = z.object({
  abbreviation: z.string().optional(),
  teamCode: z.string().optional(),
  name: z.string().optional(),
});

const sideSchema = z.object({
  team: teamSchema.default({}),
  probablePitcher: z.object({ fullName: z.string().optional() }).optional(),
});

const gameSchema = z.object({
  gamePk: z.number().optional(),
  gameDate: z.string().optional(),
  teams: z
    .object({
      away: sideSchema.default({}),
      home: sideSchema.default({}),
    })
    .default({}),
});

const scheduleSchema = z.object({
  dates: z.array(z.object({ games: z.array(gameSchema).default([]) })).default([]),
});

export class ScheduleFetchError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`Schedule request failed with HTTP ${status}: ${url}`);
    this.name = 'ScheduleFetchError';
  }
}

function teamIdentifier(team: z.infer<typeof teamSchema>): string {
  return team.abbreviation || team.teamCode || team.name || '';
}

/** Flatten an MLB Stats API schedule body into raw game descriptors. */
export function parseMlbSchedule(body: unknown): RawGameDescriptor[] {
  const schedule = scheduleSchema.parse(body);
  const games: RawGameDescriptor[] = [];

  for (const day of schedule.dates) {
    for (const g of day.games) {
      games.push({
        awayTeamRaw: teamIdentifier(g.teams.away.team),
        homeTeamRaw: teamIdentifier(g.teams.home.team),
        startsAt: g.gameDate ?? null,
        awayPitcher: g.teams.away.probablePitcher?.fullName ?? '',
        homePitcher: g.teams.home.probablePitcher?.fullName ?? '',
        boxLink: g.gamePk ? `${GAMEDAY_BASE}/${g.gamePk}` : '',
      });
    }
  }

  return games;
}

export function toSlateEntries(gameDate: string, games: RawGameDescriptor[]): SlateEntry[] {
  return games.map((g) => ({
    gameDate,
    away: normalizeTeam(g.awayTeamRaw),
    home: normalizeTeam(g.homeTeamRaw),
    startEt: toEasternTime(g.startsAt),
    awayPitcher: g.awayPitcher,
    homePitcher: g.homePitcher,
    boxLink: g.boxLink,
  }));
}

export function scheduleUrl(gameDate: string): string {
  const params = new URLSearchParams({
    sportId: '1',
    date: gameDate,
    hydrate: 'probablePitchers,team,linescore',
    language: 'en',
  });
  return `${MLB_STATS_BASE}/schedule?${params.toString()}`;
}

export class MlbStatsScheduleProvider implements ScheduleProvider {
  readonly name = 'MLB Stats API';

  async fetchGames(gameDate: string): Promise<RawGameDescriptor[]> {
    const url = scheduleUrl(gameDate);
    const log = logger.child({ provider: this.name, date: gameDate });

    const { statusCode, body } = await request(url, {
      method: 'GET',
      headers: { 'User-Agent': 'mlb-slate-picks/0.1', Accept: 'application/json' },
      headersTimeout: 20000,
      bodyTimeout: 20000,
    });

    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      throw new ScheduleFetchError(url, statusCode);
    }

    const games = parseMlbSchedule(await body.json());
    log.info({ count: games.length }, 'Schedule fetched');
    return games;
  }
}
