import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiSportsResultsSource, type ApiSportsSourceOptions } from '../lib/results/api-sports-source.ts';
import { TeamMappingCache } from '../lib/results/team-mapping-cache.ts';
import type { EventQuery } from '../types/results.ts';

function game(id: number, status: string, home: string, away: string, scores: [number, number] | null, time = '19:05') {
  return {
    id,
    date: `2026-10-18T${time}:00-04:00`,
    status: { short: status },
    teams: { home: { name: home }, away: { name: away } },
    scores: scores ? { home: { total: scores[0] }, away: { total: scores[1] } } : { home: { total: null }, away: { total: null } },
  };
}

const BASEBALL_DAY = {
  errors: [],
  response: [
    game(101, 'FT', 'New York Yankees', 'Boston Red Sox', [5, 3]),
    game(102, 'IN5', 'Chicago Cubs', 'St. Louis Cardinals', [2, 1], '20:10'),
    game(103, 'NS', 'Los Angeles Dodgers', 'San Diego Padres', null, '22:10'),
    game(104, 'CANC', 'Houston Astros', 'Texas Rangers', null),
    game(105, 'POST', 'Miami Marlins', 'Atlanta Braves', null),
  ],
};

function query(participants: string[], overrides: Partial<EventQuery> = {}): EventQuery {
  return { pickId: 'pick-1', sport: 'MLB', participants, date: '2026-10-18', ...overrides };
}

function setup(body: unknown = BASEBALL_DAY, extra: Partial<ApiSportsSourceOptions> = {}) {
  const fetchImpl = vi.fn<typeof fetch>(async () => new Response(JSON.stringify(body)));
  const source = new ApiSportsResultsSource({
    apiKeys: ['test-key'],
    timezone: 'America/New_York',
    retry: { retries: 1, baseDelayMs: 0, timeoutMs: 1000 },
    fetchImpl,
    sleep: async () => undefined,
    today: () => '2026-10-19',
    ...extra,
  });
  return { fetchImpl, source };
}

describe('ApiSportsResultsSource', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('returns the final score in the order the pick names the teams', async () => {
    const { source, fetchImpl } = setup();

    await expect(source.lookup(query(['Boston Red Sox', 'New York Yankees']))).resolves.toEqual({
      kind: 'outcome',
      outcome: {
        providerEventId: '101',
        status: 'final',
        participants: [
          { name: 'Boston Red Sox', score: 3 },
          { name: 'New York Yankees', score: 5 },
        ],
        startsAt: '2026-10-18T19:05:00-04:00',
      },
    });
    expect(fetchImpl.mock.calls[0][0]).toBe(
      'https://v1.baseball.api-sports.io/games?date=2026-10-18&timezone=America%2FNew_York'
    );
  });

  it('matches abbreviations and short names', async () => {
    const { source } = setup();

    await expect(source.lookup(query(['NYY', 'BOS']))).resolves.toMatchObject({
      kind: 'outcome',
      outcome: { providerEventId: '101' },
    });
    await expect(source.lookup(query(['Yankees', 'Red Sox']))).resolves.toMatchObject({
      kind: 'outcome',
      outcome: { providerEventId: '101' },
    });
  });

  it('fetches each sport and day once', async () => {
    const { source, fetchImpl } = setup();

    await Promise.all([
      source.lookup(query(['New York Yankees', 'Boston Red Sox'])),
      source.lookup(query(['Chicago Cubs', 'St. Louis Cardinals'])),
      source.lookup(query(['Los Angeles Dodgers', 'San Diego Padres'])),
    ]);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('reports games that are not over yet', async () => {
    const { source } = setup();

    await expect(source.lookup(query(['Chicago Cubs', 'St. Louis Cardinals']))).resolves.toEqual({
      kind: 'not_available',
      reason: 'in_progress',
      detail: 'IN5',
    });
    await expect(source.lookup(query(['Los Angeles Dodgers', 'San Diego Padres']))).resolves.toEqual({
      kind: 'not_available',
      reason: 'scheduled',
      detail: 'NS',
    });
    await expect(source.lookup(query(['Miami Marlins', 'Atlanta Braves']))).resolves.toEqual({
      kind: 'not_available',
      reason: 'postponed',
      detail: 'POST',
    });
  });

  it('returns a cancelled outcome for cancelled games', async () => {
    const { source } = setup();

    await expect(source.lookup(query(['Houston Astros', 'Texas Rangers']))).resolves.toMatchObject({
      kind: 'outcome',
      outcome: {
        status: 'cancelled',
        participants: [
          { name: 'Houston Astros', score: 0 },
          { name: 'Texas Rangers', score: 0 },
        ],
      },
    });
  });

  it('does not ask the provider about future games', async () => {
    const { source, fetchImpl } = setup();

    await expect(source.lookup(query(['New York Yankees', 'Boston Red Sox'], { date: '2026-10-20' }))).resolves.toEqual({
      kind: 'not_available',
      reason: 'scheduled',
      detail: 'game is on 2026-10-20',
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('lists the day as candidates when nothing matches', async () => {
    const { source } = setup();

    const result = await source.lookup(query(['Seattle Mariners', 'Toronto Blue Jays']));

    expect(result).toEqual({
      kind: 'no_match',
      reason: 'not_found',
      candidates: [
        'New York Yankees vs Boston Red Sox (2026-10-18)',
        'Chicago Cubs vs St. Louis Cardinals (2026-10-18)',
        'Los Angeles Dodgers vs San Diego Padres (2026-10-18)',
        'Houston Astros vs Texas Rangers (2026-10-18)',
        'Miami Marlins vs Atlanta Braves (2026-10-18)',
      ],
    });
  });

  it('refuses to pick between two games of a doubleheader', async () => {
    const { source } = setup({
      response: [
        game(201, 'FT', 'New York Yankees', 'Boston Red Sox', [5, 3], '13:05'),
        game(202, 'FT', 'New York Yankees', 'Boston Red Sox', [1, 2], '19:05'),
      ],
    });

    await expect(source.lookup(query(['New York Yankees', 'Boston Red Sox']))).resolves.toEqual({
      kind: 'no_match',
      reason: 'ambiguous',
      candidates: [
        'New York Yankees vs Boston Red Sox (2026-10-18)',
        'New York Yankees vs Boston Red Sox (2026-10-18)',
      ],
    });
  });

  it('has no source for sports it does not cover', async () => {
    const { source, fetchImpl } = setup();

    await expect(source.lookup(query(['Carlos Alcaraz', 'Jannik Sinner'], { sport: 'Tennis' }))).resolves.toEqual({
      kind: 'no_match',
      reason: 'unsupported_sport',
      candidates: [],
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('degrades transport failures to not available and retries the day later', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('{}', { status: 500 }));
    const { source } = setup(BASEBALL_DAY, { fetchImpl });

    const failed = await source.lookup(query(['New York Yankees', 'Boston Red Sox']));
    expect(failed).toEqual({ kind: 'not_available', reason: 'transport', detail: 'Provider returned 500' });
    expect(fetchImpl).toHaveBeenCalledTimes(2);

    fetchImpl.mockImplementation(async () => new Response(JSON.stringify(BASEBALL_DAY)));
    await expect(source.lookup(query(['New York Yankees', 'Boston Red Sox']))).resolves.toMatchObject({ kind: 'outcome' });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('treats a provider error payload as a transport failure', async () => {
    const { source } = setup({ errors: { token: 'Error/Missing application key.' }, response: [] });

    await expect(source.lookup(query(['New York Yankees', 'Boston Red Sox']))).resolves.toEqual({
      kind: 'not_available',
      reason: 'transport',
      detail: 'Provider error: {"token":"Error/Missing application key."}',
    });
  });

  it('settles soccer on the full-time score and ignores club affixes', async () => {
    const { source, fetchImpl } = setup({
      errors: [],
      response: [
        {
          fixture: { id: 9001, date: '2026-10-18T16:00:00-04:00', status: { short: 'PEN' } },
          teams: { home: { name: 'Barcelona' }, away: { name: 'Real Madrid' } },
          goals: { home: 3, away: 2 },
          score: { fulltime: { home: 1, away: 1 } },
        },
      ],
    });

    const result = await source.lookup(query(['FC Barcelona', 'Real Madrid'], { sport: 'Soccer' }));

    expect(result).toMatchObject({
      kind: 'outcome',
      outcome: {
        providerEventId: '9001',
        status: 'final',
        participants: [
          { name: 'Barcelona', score: 1 },
          { name: 'Real Madrid', score: 1 },
        ],
      },
    });
    expect(fetchImpl.mock.calls[0][0]).toBe(
      'https://v3.football.api-sports.io/fixtures?date=2026-10-18&timezone=America%2FNew_York'
    );
  });

  it('applies operator team mappings', async () => {
    const mappings = new TeamMappingCache({
      fetchMappings: async () => [{ source_name: 'Bronx Bombers', canonical_name: 'New York Yankees' }],
    });
    const { source } = setup(BASEBALL_DAY, { mappings });

    await expect(source.lookup(query(['Bronx Bombers', 'Boston Red Sox']))).resolves.toMatchObject({
      kind: 'outcome',
      outcome: { providerEventId: '101' },
    });
  });
});
