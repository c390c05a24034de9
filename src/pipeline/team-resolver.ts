/** Canonical MLB codes as the schedule reports them. */
export const CANONICAL_TEAM_CODES = [
  'ATH', 'ATL', 'AZ', 'BAL', 'BOS', 'CHC', 'CHW', 'CIN', 'CLE', 'COL',
  'DET', 'HOU', 'KC', 'LAA', 'LAD', 'MIA', 'MIL', 'MIN', 'NYM', 'NYY',
  'PHI', 'PIT', 'SD', 'SEA', 'SF', 'STL', 'TB', 'TEX', 'TOR', 'WSH',
] as const;

export type TeamCode = (typeof CANONICAL_TEAM_CODES)[number];

// Cross-site variants -> canonical code. Keys are already uppercased.
const TEAM_ALIASES: Readonly<Record<string, TeamCode>> = {
  ARI: 'AZ',
  'D-BACKS': 'AZ',
  SFG: 'SF',
  SDP: 'SD',
  TBR: 'TB',
  CWS: 'CHW',
  WAS: 'WSH',
  KCR: 'KC',
  OAK: 'ATH',
  "OAK A'S": 'ATH',
};

const aliasMap: ReadonlyMap<string, TeamCode> = new Map<string, TeamCode>([
  ...CANONICAL_TEAM_CODES.map((code): [string, TeamCode] => [code, code]),
  ...Object.entries(TEAM_ALIASES),
]);

/**
 * Normalize a team code so the odds feed and the schedule share keys.
 * Unknown codes come back trimmed and uppercased.
 */
export function normalizeTeam(raw: string): string {
  const code = raw.trim().toUpperCase();
  return aliasMap.get(code) ?? code;
}
