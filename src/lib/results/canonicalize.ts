// ============================================================================
// CANONICALIZATION UTILITIES
// ============================================================================
// Deterministic participant matching between pick records and the results
// provider. Names are normalized, resolved through operator mappings and the
// sport's abbreviation map, then compared word by word.
// ============================================================================

import type { SportConfig } from './sports-config.ts';

// Tokens that only decorate a club name ("FC Barcelona" vs "Barcelona")
const CLUB_AFFIXES = new Set(['fc', 'cf', 'afc', 'sc', 'ac', 'cd', 'fk', 'sk', 'club']);

// A single-word partial name must be at least this long to count
const MIN_PARTIAL_LENGTH = 4;

/**
 * Normalize a raw name for matching.
 * Strips diacritics and punctuation, lowercases, collapses whitespace.
 * "Atlético  Madrid" -> "atletico madrid"
 */
export function normalizeRaw(raw: string): string {
  return raw
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[-_/]/g, ' ')
    .replace(/[^a-z0-9\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Normalized name with club affixes removed.
 * "F.C. Barcelona" -> "barcelona"
 */
export function normalizeName(raw: string): string {
  const words = normalizeRaw(raw).split(' ').filter(w => w.length > 0);
  const core = words.filter(w => !CLUB_AFFIXES.has(w));
  return (core.length > 0 ? core : words).join(' ');
}

/**
 * Resolve a raw name to its canonical normalized form.
 *
 * Resolution order:
 * 1. Operator mappings (team_mappings table), highest priority
 * 2. Abbreviation keys of the sport's team map ("nyy")
 * 3. The name itself
 */
export function resolveTeamName(
  rawName: string,
  sport: SportConfig | null,
  userMappings?: Map<string, string>
): string {
  const rawNorm = normalizeRaw(rawName);

  const mapped = userMappings?.get(rawNorm);
  if (mapped) return normalizeName(mapped);

  if (sport && Object.hasOwn(sport.teamMap, rawNorm)) {
    return normalizeName(sport.teamMap[rawNorm]);
  }

  return normalizeName(rawName);
}

function containsRun(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;
  for (let start = 0; start + needle.length <= haystack.length; start++) {
    if (needle.every((word, i) => haystack[start + i] === word)) return true;
  }
  return false;
}

/**
 * Two canonical names agree when they are equal, or when the shorter one is a
 * whole-word run inside the longer ("yankees" in "new york yankees").
 */
export function namesAgree(a: string, b: string): boolean {
  if (a.length === 0 || b.length === 0) return false;
  if (a === b) return true;

  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.replace(/\s/g, '').length < MIN_PARTIAL_LENGTH) return false;

  return containsRun(longer.split(' '), shorter.split(' '));
}

/**
 * Parse "Team A vs Team B" or "Team A @ Team B" style titles.
 * Returns the two team names in order (first team, second team).
 */
export function splitTeams(title: string): { a: string; b: string } | null {
  const match = title.match(/^(.+?)\s+(?:vs\.?|@|v\.?)\s+(.+?)(?:\s+[-–—]\s+.*)?$/i);
  if (!match) return null;

  return {
    a: match[1].trim(),
    b: match[2].trim(),
  };
}
