import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { TeamMappingCache, type TeamMappingStore } from '../lib/results/team-mapping-cache.ts';

describe('TeamMappingCache', () => {
  let clock: number;
  let fetchMappings: Mock<TeamMappingStore['fetchMappings']>;

  beforeEach(() => {
    clock = 1_000_000;
    fetchMappings = vi.fn<TeamMappingStore['fetchMappings']>(async () => [
      { source_name: 'Man Utd', canonical_name: 'Manchester United' },
      { source_name: 'Spurs', canonical_name: 'Tottenham Hotspur' },
    ]);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  const cache = () => new TeamMappingCache({ fetchMappings }, 60_000, () => clock);

  it('keys mappings by the normalized source name', async () => {
    const mappings = await cache().getTeamMappings('soccer');

    expect([...mappings]).toEqual([
      ['man utd', 'Manchester United'],
      ['spurs', 'Tottenham Hotspur'],
    ]);
    expect(fetchMappings).toHaveBeenCalledWith('soccer');
  });

  it('reuses a sport map until the TTL runs out', async () => {
    const mappings = cache();

    await mappings.getTeamMappings('soccer');
    clock += 59_999;
    await mappings.getTeamMappings('soccer');
    expect(fetchMappings).toHaveBeenCalledTimes(1);

    clock += 1;
    await mappings.getTeamMappings('soccer');
    expect(fetchMappings).toHaveBeenCalledTimes(2);
  });

  it('keeps one entry per sport', async () => {
    const mappings = cache();

    await mappings.getTeamMappings('soccer');
    await mappings.getTeamMappings('nba');

    expect(fetchMappings.mock.calls).toEqual([['soccer'], ['nba']]);
  });

  it('falls back to the last good map when the store fails', async () => {
    const mappings = cache();
    const first = await mappings.getTeamMappings('soccer');

    clock += 60_000;
    fetchMappings.mockRejectedValueOnce(new Error('connection refused'));

    await expect(mappings.getTeamMappings('soccer')).resolves.toBe(first);
    expect(console.warn).toHaveBeenCalledWith(
      '[team-mapping-cache] Failed to fetch mappings for soccer: connection refused'
    );
  });

  it('returns an empty map when nothing was ever loaded', async () => {
    fetchMappings.mockRejectedValueOnce(new Error('connection refused'));

    const mappings = await cache().getTeamMappings('nhl');

    expect(mappings.size).toBe(0);
  });
});
