// ============================================================================
// API-SPORTS RESULTS SOURCE
// ============================================================================
// Looks up final scores for pick events. One provider request per
// (sport, date) per run; every pick on that day is matched against the
// cached list. Transport failures degrade to "not available" so the pick is
// retried on the next run.
// ============================================================================

import { LookupTransportError, OutcomeMismatchError } from '../errors.ts';
import type {
  EventQuery,
  LookupResult,
  Outcome,
  OutcomeParticipant,
  ResultsSource,
} from '../../types/results.ts';
import {
  describeGame,
  findMatchingGames,
  type MatchedGame,
  type ProviderGame,
  type ProviderSide,
} from './event-matcher.ts';
import { fetchWithKeyRotation, type RetryPolicy } from './provider-fetch.ts';
import { getSportConfig, type SportConfig } from './sports-config.ts';
import type { TeamMappingCache } from './team-mapping-cache.ts';

const TAG = '[RESULTS-SOURCE]';
const NOT_STARTED_STATUSES = new Set(['NS', 'TBD']);

export interface ApiSportsSourceOptions {
  apiKeys: string[];
  timezone: string;
  retry: RetryPolicy;
  mappings?: TeamMappingCache;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  today?: () => string;   // yyyy-MM-dd in the results timezone
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function asScore(value: unknown): number | null {
  // hockey reports a bare number, the other v1 sports { total }
  const raw = isRecord(value) ? value.total : value;
  return typeof raw === 'number' && Number.isFinite(raw) ? raw : null;
}

function asSide(name: unknown, score: unknown): ProviderSide | null {
  return typeof name === 'string' ? { name, score: asScore(score) } : null;
}

function toGame(id: unknown, date: unknown, status: unknown, home: ProviderSide | null, away: ProviderSide | null): ProviderGame | null {
  if ((typeof id !== 'number' && typeof id !== 'string') || typeof date !== 'string' || !home || !away) {
    return null;
  }
  return {
    id: String(id),
    date,
    localDate: date.slice(0, 10),
    status: typeof status === 'string' ? status : '',
    home,
    away,
  };
}

/**
 * Reduce a provider response body to games. Entries missing teams or a date
 * are skipped.
 */
export function parseProviderGames(body: unknown, sport: SportConfig): ProviderGame[] {
  const errors = field(body, 'errors');
  if ((Array.isArray(errors) && errors.length > 0) || (isRecord(errors) && Object.keys(errors).length > 0)) {
    throw new LookupTransportError(`Provider error: ${JSON.stringify(errors)}`);
  }

  const items = field(body, 'response');
  if (!Array.isArray(items)) {
    throw new LookupTransportError('Provider response has no "response" list');
  }

  const games: ProviderGame[] = [];
  for (const item of items) {
    const game = sport.api === 'fixtures'
      ? toGame(
          field(item, 'fixture', 'id'),
          field(item, 'fixture', 'date'),
          field(item, 'fixture', 'status', 'short'),
          // settle on the regulation score when the provider gives one
          asSide(field(item, 'teams', 'home', 'name'), field(item, 'score', 'fulltime', 'home') ?? field(item, 'goals', 'home')),
          asSide(field(item, 'teams', 'away', 'name'), field(item, 'score', 'fulltime', 'away') ?? field(item, 'goals', 'away'))
        )
      : toGame(
          field(item, 'id'),
          field(item, 'date'),
          field(item, 'status', 'short'),
          asSide(field(item, 'teams', 'home', 'name'), field(item, 'scores', 'home')),
          asSide(field(item, 'teams', 'away', 'name'), field(item, 'scores', 'away'))
        );
    if (game) games.push(game);
  }
  return games;
}

/**
 * Classify a matched provider game into a lookup result. Outcome participants
 * follow the order of the pick's participants.
 */
export function gameToLookupResult({ game, order }: MatchedGame, sport: SportConfig): LookupResult {
  const sides = [game.home, game.away];
  const ordered = [...order, ...[0, 1].filter(i => !order.includes(i))].map(i => sides[i]);

  if (sport.cancelledStatuses.includes(game.status)) {
    const outcome: Outcome = {
      providerEventId: game.id,
      status: 'cancelled',
      participants: ordered.map(side => ({ name: side.name, score: side.score ?? 0 })),
      startsAt: game.date,
    };
    return { kind: 'outcome', outcome };
  }

  if (sport.finishedStatuses.includes(game.status)) {
    const participants: OutcomeParticipant[] = [];
    for (const side of ordered) {
      if (side.score === null) {
        throw new OutcomeMismatchError(`Final score missing for ${describeGame(game)}`);
      }
      participants.push({ name: side.name, score: side.score });
    }
    const outcome: Outcome = {
      providerEventId: game.id,
      status: 'final',
      participants,
      startsAt: game.date,
    };
    return { kind: 'outcome', outcome };
  }

  if (sport.postponedStatuses.includes(game.status)) {
    return { kind: 'not_available', reason: 'postponed', detail: game.status };
  }
  if (NOT_STARTED_STATUSES.has(game.status)) {
    return { kind: 'not_available', reason: 'scheduled', detail: game.status };
  }
  return { kind: 'not_available', reason: 'in_progress', detail: game.status };
}

export class ApiSportsResultsSource implements ResultsSource {
  private readonly gamesByDay = new Map<string, Promise<ProviderGame[]>>();
  private readonly today: () => string;

  constructor(private readonly options: ApiSportsSourceOptions) {
    // en-CA formats as yyyy-MM-dd
    const dayFormat = new Intl.DateTimeFormat('en-CA', { timeZone: options.timezone });
    this.today = options.today ?? (() => dayFormat.format(new Date()));
  }

  async lookup(query: EventQuery): Promise<LookupResult> {
    const sport = getSportConfig(query.sport, query.league);
    if (!sport) {
      return { kind: 'no_match', reason: 'unsupported_sport', candidates: [] };
    }

    if (query.date > this.today()) {
      return { kind: 'not_available', reason: 'scheduled', detail: `game is on ${query.date}` };
    }

    let games: ProviderGame[];
    try {
      games = await this.gamesOn(sport, query.date);
    } catch (err) {
      if (err instanceof LookupTransportError) {
        console.warn(`${TAG} ${sport.name} ${query.date}: ${err.message}`);
        return { kind: 'not_available', reason: 'transport', detail: err.message };
      }
      throw err;
    }

    const mappings = this.options.mappings
      ? await this.options.mappings.getTeamMappings(sport.code)
      : undefined;
    const matches = findMatchingGames(games, query, sport, mappings);

    if (matches.length === 0) {
      return { kind: 'no_match', reason: 'not_found', candidates: games.map(describeGame) };
    }
    if (matches.length > 1) {
      return { kind: 'no_match', reason: 'ambiguous', candidates: matches.map(m => describeGame(m.game)) };
    }
    return gameToLookupResult(matches[0], sport);
  }

  private gamesOn(sport: SportConfig, date: string): Promise<ProviderGame[]> {
    const key = `${sport.code}|${date}`;
    const cached = this.gamesByDay.get(key);
    if (cached) return cached;

    const params = new URLSearchParams({ date, timezone: this.options.timezone });
    const url = `${sport.baseUrl}/${sport.api}?${params.toString()}`;
    console.log(`${TAG} Fetching ${sport.name} games for ${date}`);

    const pending = fetchWithKeyRotation(url, {
      apiKeys: this.options.apiKeys,
      retry: this.options.retry,
      context: 'api-sports',
      fetchImpl: this.options.fetchImpl,
      sleep: this.options.sleep,
    }).then(body => parseProviderGames(body, sport));

    // failed days are retried by the next lookup instead of caching the error
    void pending.catch(() => this.gamesByDay.delete(key));
    this.gamesByDay.set(key, pending);
    return pending;
  }
}
