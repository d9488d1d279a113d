// ============================================================================
// SPORTS CONFIGURATION
// ============================================================================
// One entry per sport the results provider can settle.
// To add a sport, add an entry here and its abbreviations to team-maps.json.
// ============================================================================

import teamMaps from './team-maps.json';

export type SportCode = 'mlb' | 'nba' | 'nhl' | 'nfl' | 'soccer';

// 'games' = API-Sports v1 family, 'fixtures' = API-Football v3
export type ProviderApi = 'games' | 'fixtures';

export interface SportConfig {
  code: SportCode;
  name: string;
  baseUrl: string;
  api: ProviderApi;
  allowsDraw: boolean;
  aliases: string[];
  finishedStatuses: string[];
  cancelledStatuses: string[];
  postponedStatuses: string[];
  teamMap: Record<string, string>;
}

const TEAM_MAPS: Record<string, Record<string, string>> = teamMaps;

export const SPORTS_CONFIG: Record<SportCode, SportConfig> = {
  mlb: {
    code: 'mlb',
    name: 'MLB',
    baseUrl: 'https://v1.baseball.api-sports.io',
    api: 'games',
    allowsDraw: false,
    aliases: ['mlb', 'baseball'],
    finishedStatuses: ['FT'],
    cancelledStatuses: ['CANC', 'ABD'],
    postponedStatuses: ['POST', 'INTR'],
    teamMap: TEAM_MAPS.mlb ?? {},
  },
  nba: {
    code: 'nba',
    name: 'NBA',
    baseUrl: 'https://v1.basketball.api-sports.io',
    api: 'games',
    allowsDraw: false,
    aliases: ['nba', 'basketball', 'wnba', 'ncaab'],
    finishedStatuses: ['FT', 'AOT'],
    cancelledStatuses: ['CANC', 'ABD'],
    postponedStatuses: ['POST'],
    teamMap: TEAM_MAPS.nba ?? {},
  },
  nhl: {
    code: 'nhl',
    name: 'NHL',
    baseUrl: 'https://v1.hockey.api-sports.io',
    api: 'games',
    allowsDraw: false,
    aliases: ['nhl', 'hockey', 'ice hockey'],
    finishedStatuses: ['FT', 'AOT', 'AP'],
    cancelledStatuses: ['CANC', 'ABD'],
    postponedStatuses: ['POST'],
    teamMap: TEAM_MAPS.nhl ?? {},
  },
  nfl: {
    code: 'nfl',
    name: 'NFL',
    baseUrl: 'https://v1.american-football.api-sports.io',
    api: 'games',
    // NFL regular season can end level after overtime
    allowsDraw: true,
    aliases: ['nfl', 'american football', 'ncaaf'],
    finishedStatuses: ['FT', 'AOT'],
    cancelledStatuses: ['CANC'],
    postponedStatuses: ['POST'],
    teamMap: TEAM_MAPS.nfl ?? {},
  },
  soccer: {
    code: 'soccer',
    name: 'Soccer',
    baseUrl: 'https://v3.football.api-sports.io',
    api: 'fixtures',
    allowsDraw: true,
    aliases: ['soccer', 'football', 'epl', 'la liga', 'serie a', 'bundesliga', 'ucl', 'mls'],
    finishedStatuses: ['FT', 'AET', 'PEN'],
    cancelledStatuses: ['CANC', 'ABD', 'AWD', 'WO'],
    postponedStatuses: ['PST', 'SUSP', 'INT'],
    teamMap: TEAM_MAPS.soccer ?? {},
  },
};

/**
 * Resolve a pick's sport (and league, as a fallback) to a configured sport.
 * "Baseball" and "MLB" both resolve to mlb.
 */
export function getSportConfig(sport: string, league?: string): SportConfig | null {
  for (const label of [sport, league]) {
    if (!label) continue;
    const key = label.trim().toLowerCase();
    for (const config of Object.values(SPORTS_CONFIG)) {
      if (config.aliases.includes(key)) return config;
    }
  }
  return null;
}
