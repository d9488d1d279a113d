// ============================================================================
// TEAM MAPPING CACHE
// ============================================================================
// Operator-defined name corrections ("Man Utd" -> "Manchester United").
// These take priority over the built-in abbreviation maps, so a pick that
// keeps failing to match can be fixed without editing the ledger.
// ============================================================================

import { createClient } from '@supabase/supabase-js';
import { normalizeRaw } from './canonicalize.ts';

export interface TeamMappingRow {
  source_name: string;
  canonical_name: string;
}

export interface TeamMappingStore {
  fetchMappings(sportCode: string): Promise<TeamMappingRow[]>;
}

interface CachedMappings {
  data: Map<string, string>;  // normalized source_name → canonical_name
  fetchedAt: number;
}

const CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes

/**
 * Reads the `team_mappings` table (source_name, canonical_name, sport_code).
 */
export function createSupabaseMappingStore(url: string, serviceKey: string): TeamMappingStore {
  const supabase = createClient(url, serviceKey, {
    auth: { persistSession: false },
  });

  return {
    async fetchMappings(sportCode: string): Promise<TeamMappingRow[]> {
      const { data, error } = await supabase
        .from('team_mappings')
        .select('source_name, canonical_name')
        .eq('sport_code', sportCode);

      if (error) throw new Error(error.message);

      const rows: TeamMappingRow[] = [];
      for (const row of data ?? []) {
        if (typeof row.source_name === 'string' && typeof row.canonical_name === 'string') {
          rows.push({ source_name: row.source_name, canonical_name: row.canonical_name });
        }
      }
      return rows;
    },
  };
}

/**
 * Per-sport cache in front of a TeamMappingStore.
 * A failed fetch falls back to the last good map (or an empty one) and is not cached.
 */
export class TeamMappingCache {
  private readonly cacheByCode = new Map<string, CachedMappings>();

  constructor(
    private readonly store: TeamMappingStore,
    private readonly ttlMs: number = CACHE_TTL_MS,
    private readonly clock: () => number = Date.now
  ) {}

  async getTeamMappings(sportCode: string): Promise<Map<string, string>> {
    const now = this.clock();

    const cached = this.cacheByCode.get(sportCode);
    if (cached && now - cached.fetchedAt < this.ttlMs) {
      return cached.data;
    }

    try {
      const rows = await this.store.fetchMappings(sportCode);

      const map = new Map<string, string>();
      for (const row of rows) {
        map.set(normalizeRaw(row.source_name), row.canonical_name);
      }

      this.cacheByCode.set(sportCode, { data: map, fetchedAt: now });
      console.log(`[team-mapping-cache] Loaded ${map.size} mappings for ${sportCode}`);
      return map;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[team-mapping-cache] Failed to fetch mappings for ${sportCode}: ${message}`);
      return cached?.data ?? new Map();
    }
  }

  clear(): void {
    this.cacheByCode.clear();
  }
}
