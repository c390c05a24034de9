import { MockAgent, getGlobalDispatcher, setGlobalDispatcher } from 'undici';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  MlbStatsScheduleProvider,
  ScheduleFetchError,
  parseMlbSchedule,
  scheduleUrl,
  toSlateEntries,
} from '../../src/schedule/mlb-schedule.js';
import { loadFixture } from '../helpers/fixture-loader.js';

const body: unknown = JSON.parse(loadFixture('mlb', 'schedule-2025-08-13.json'));

describe('parseMlbSchedule', () => {
  it('should flatten games across date blocks', () => {
    expect(parseMlbSchedule(body)).toHaveLength(3);
  });

  it('should extract teams, probables and the gameday link', () => {
    expect(parseMlbSchedule(body)[0]).toEqual({
      awayTeamRaw: 'NYM',
      homeTeamRaw: 'ATL',
      startsAt: '2025-08-13T23:15:00Z',
      awayPitcher: 'Away Starter One',
      homePitcher: 'Home Starter One',
      boxLink: 'https://www.mlb.com/gameday/776001',
    });
  });

  it('should fall back to team code, then name, when abbreviation is missing', () => {
    const game = parseMlbSchedule(body)[2];
    expect(game?.awayTeamRaw).toBe('oak');
    expect(game?.homeTeamRaw).toBe('Seattle Mariners');
    expect(game?.startsAt).toBeNull();
    expect(game?.boxLink).toBe('');
  });

  it('should return no games for an empty schedule', () => {
    expect(parseMlbSchedule({ totalGames: 0, dates: [] })).toEqual([]);
    expect(parseMlbSchedule({})).toEqual([]);
  });

  it('should reject a body that is not a schedule', () => {
    expect(() => parseMlbSchedule({ dates: 'nope' })).toThrow();
  });
});

describe('toSlateEntries', () => {
  const entries = toSlateEntries('2025-08-13', parseMlbSchedule(body));

  it('should format start times in Eastern time', () => {
    expect(entries[0]?.startEt).toBe('7:15 PM');
    // first pitch after midnight UTC still belongs to the slate date
    expect(entries[1]?.startEt).toBe('9:45 PM');
    expect(entries[1]?.gameDate).toBe('2025-08-13');
  });

  it('should normalize team codes', () => {
    expect(entries.map((e) => [e.away, e.home])).toEqual([
      ['NYM', 'ATL'],
      ['AZ', 'SF'],
      ['ATH', 'SEATTLE MARINERS'],
    ]);
  });

  it('should leave missing values empty', () => {
    expect(entries[1]?.homePitcher).toBe('');
    expect(entries[2]?.startEt).toBe('');
  });
});

describe('scheduleUrl', () => {
  it('should request the day with probable pitchers hydrated', () => {
    const url = new URL(scheduleUrl('2025-08-13'));
    expect(url.origin + url.pathname).toBe('https://statsapi.mlb.com/api/v1/schedule');
    expect(url.searchParams.get('sportId')).toBe('1');
    expect(url.searchParams.get('date')).toBe('2025-08-13');
    expect(url.searchParams.get('hydrate')).toBe('probablePitchers,team,linescore');
  });
});

describe('MlbStatsScheduleProvider', () => {
  let agent: MockAgent;
  const original = getGlobalDispatcher();

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(original);
    await agent.close();
  });

  it('should fetch and parse the day\'s games', async () => {
    agent
      .get('https://statsapi.mlb.com')
      .intercept({ path: (p) => p.startsWith('/api/v1/schedule?'), method: 'GET' })
      .reply(200, JSON.stringify(body), { headers: { 'content-type': 'application/json' } });

    const games = await new MlbStatsScheduleProvider().fetchGames('2025-08-13');
    expect(games.map((g) => g.boxLink)).toEqual([
      'https://www.mlb.com/gameday/776001',
      'https://www.mlb.com/gameday/776002',
      '',
    ]);
  });

  it('should fail the run on an error status', async () => {
    agent
      .get('https://statsapi.mlb.com')
      .intercept({ path: (p) => p.startsWith('/api/v1/schedule?'), method: 'GET' })
      .reply(503, 'unavailable');

    const fetching = new MlbStatsScheduleProvider().fetchGames('2025-08-13');
    await expect(fetching).rejects.toBeInstanceOf(ScheduleFetchError);
  });
});
