// ============================================================================
// UPDATE-RESULTS: settle pending picks against final scores
// ============================================================================
// Loads the ledger, settles what has finished, saves if anything changed.
// Exit code is 0 even when picks stay pending; only ledger failures fail, and
// a missing provider key when there is something to settle.
// ============================================================================

import { ConfigError, errorMessage } from '../lib/errors.ts';
import type { AppConfig } from '../lib/config.ts';
import type { PickLedger } from '../lib/ledger/pick-ledger.ts';
import { ApiSportsResultsSource } from '../lib/results/api-sports-source.ts';
import { TeamMappingCache, createSupabaseMappingStore } from '../lib/results/team-mapping-cache.ts';
import { settlePicks, type SettlementSummary } from '../lib/settlement/settle-picks.ts';
import type { ResultsSource } from '../types/results.ts';

const TAG = '[UPDATE-RESULTS]';

export interface UpdateResultsOptions {
  ledger: PickLedger;
  source: () => ResultsSource; // called once, only when pending picks exist
  concurrency?: number;
  now?: () => Date;
}

export function createResultsSource(config: AppConfig): ResultsSource {
  if (config.apiKeys.length === 0) {
    throw new ConfigError('API_SPORTS_KEY is not set');
  }

  const mappings = config.supabase
    ? new TeamMappingCache(createSupabaseMappingStore(config.supabase.url, config.supabase.serviceKey))
    : undefined;

  return new ApiSportsResultsSource({
    apiKeys: config.apiKeys,
    timezone: config.timezone,
    retry: config.retry,
    mappings,
  });
}

export function formatSettlementSummary(summary: SettlementSummary): string {
  const lines = [
    `Checked ${summary.checked} pending picks`,
    `  Settled:        ${summary.settled}`,
    `  Still pending:  ${summary.pending}`,
    `  Unmatched:      ${summary.unmatched}`,
    `  Not available:  ${summary.notAvailable}`,
    `  Failed:         ${summary.failed}`,
  ];
  for (const result of summary.results) {
    lines.push(`  ✓ ${result.pickId}: ${result.status} (${result.profitLoss >= 0 ? '+' : ''}${result.profitLoss.toFixed(2)})`);
  }
  for (const issue of summary.issues.filter(i => i.kind !== 'not_available')) {
    lines.push(`  ⚠️ ${issue.pickId} ${issue.event}: ${issue.message}`);
  }
  return lines.join('\n');
}

export async function updateResults(options: UpdateResultsOptions): Promise<number> {
  const startTime = Date.now();
  console.log(`${TAG} Starting results update...`);

  try {
    const picks = await options.ledger.load();
    if (picks.length === 0) {
      console.log(`${TAG} No picks found.`);
      return 0;
    }
    if (!picks.some(p => p.status === 'pending')) {
      console.log(`${TAG} No pending picks.`);
      return 0;
    }

    const { picks: updated, summary } = await settlePicks(picks, options.source(), {
      now: options.now,
      concurrency: options.concurrency,
    });

    if (summary.settled > 0) {
      await options.ledger.save(updated);
    }

    console.log(formatSettlementSummary(summary));
    console.log(`${TAG} Finished in ${Date.now() - startTime}ms`);
    return 0;
  } catch (error) {
    console.error(`${error instanceof ConfigError ? '[CONFIG]' : TAG} Error: ${errorMessage(error)}`);
    return 1;
  }
}
