import type { EventQuery } from '../../types/results.ts';
import { namesAgree, resolveTeamName } from './canonicalize.ts';
import type { SportConfig } from './sports-config.ts';

export interface ProviderSide {
  name: string;
  score: number | null;
}

// Provider event reduced to what matching and grading need
export interface ProviderGame {
  id: string;
  date: string;          // provider timestamp in the requested timezone
  localDate: string;     // yyyy-MM-dd part of `date`
  status: string;        // provider short status code
  home: ProviderSide;
  away: ProviderSide;
}

/**
 * Assign each wanted name to a different actual name it agrees with.
 * Returns the actual index chosen for each wanted name, or null.
 */
export function alignParticipants(wanted: string[], actual: string[]): number[] | null {
  if (wanted.length === 0 || wanted.length > actual.length) return null;

  const order: number[] = [];
  const assign = (i: number): boolean => {
    if (i === wanted.length) return true;
    for (let j = 0; j < actual.length; j++) {
      if (order.includes(j) || !namesAgree(wanted[i], actual[j])) continue;
      order.push(j);
      if (assign(i + 1)) return true;
      order.pop();
    }
    return false;
  };

  return assign(0) ? order : null;
}

export interface MatchedGame {
  game: ProviderGame;
  order: number[];   // order[i]: 0 = home, 1 = away for the query's i-th participant
}

/**
 * All provider games on the query's day whose participants agree with the
 * query's. More than one result means the description is ambiguous.
 */
export function findMatchingGames(
  games: ProviderGame[],
  query: EventQuery,
  sport: SportConfig | null,
  userMappings?: Map<string, string>
): MatchedGame[] {
  const wanted = query.participants.map(p => resolveTeamName(p, sport, userMappings));

  const matches: MatchedGame[] = [];
  for (const game of games) {
    if (game.localDate !== query.date) continue;
    const actual = [game.home.name, game.away.name].map(n => resolveTeamName(n, sport, userMappings));
    const order = alignParticipants(wanted, actual);
    if (order) matches.push({ game, order });
  }
  return matches;
}

export function describeGame(game: ProviderGame): string {
  return `${game.home.name} vs ${game.away.name} (${game.localDate})`;
}
