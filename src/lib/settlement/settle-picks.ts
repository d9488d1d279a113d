// ============================================================================
// SETTLEMENT
// ============================================================================
// Checks every pending pick against the results source and settles the ones
// whose event has finished. Settled and pending picks alike come back in
// ledger order; the caller saves the returned list.
// ============================================================================

import { errorMessage } from '../errors.ts';
import type { Pick, SettledStatus } from '../../types/picks.ts';
import type { EventQuery, LookupResult, ResultsSource } from '../../types/results.ts';
import { calculateProfitLoss, gradePick } from './grade-pick.ts';

const TAG = '[SETTLE]';
const DEFAULT_CONCURRENCY = 4;

export interface SettleOptions {
  now?: () => Date;
  concurrency?: number;
}

export type SettlementIssueKind = 'no_match' | 'not_available' | 'failed';

export interface SettlementIssue {
  pickId: string;
  event: string;
  kind: SettlementIssueKind;
  message: string;
}

export interface SettledPickResult {
  pickId: string;
  status: SettledStatus;
  profitLoss: number;
}

export interface SettlementSummary {
  checked: number;
  settled: number;
  pending: number;      // still pending after the run
  unmatched: number;
  notAvailable: number;
  failed: number;
  results: SettledPickResult[];
  issues: SettlementIssue[];
}

export interface SettlementRun {
  picks: Pick[];
  summary: SettlementSummary;
}

type LookupAttempt = { ok: true; result: LookupResult } | { ok: false; error: unknown };

export function toEventQuery(pick: Pick): EventQuery {
  return {
    pickId: pick.id,
    sport: pick.sport,
    league: pick.league,
    participants: pick.event.participants,
    date: pick.event.date,
    time: pick.event.time,
    venue: pick.event.venue,
  };
}

export function describeEvent(pick: Pick): string {
  return `${pick.event.participants.join(' vs ')} (${pick.sport}, ${pick.event.date})`;
}

/**
 * Copy of a pending pick with status, profit/loss and settlement time set
 * together.
 */
export function applySettlement(pick: Pick, status: SettledStatus, settledAt: Date): Pick {
  return {
    ...pick,
    status,
    profit_loss: calculateProfitLoss(status, pick.stake, pick.odds),
    settled_at: settledAt.toISOString(),
  };
}

async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Settle every pending pick whose outcome is available. Terminal picks are
 * returned untouched. A failure on one pick is recorded in the summary and
 * never stops the others.
 */
export async function settlePicks(
  picks: Pick[],
  source: ResultsSource,
  options: SettleOptions = {}
): Promise<SettlementRun> {
  const now = options.now ?? (() => new Date());
  const startTime = Date.now();

  const pending = picks.filter(p => p.status === 'pending');
  console.log(`${TAG} Checking ${pending.length} pending picks`);

  const attempts = await mapWithConcurrency(
    pending,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    async (pick): Promise<LookupAttempt> => {
      try {
        return { ok: true, result: await source.lookup(toEventQuery(pick)) };
      } catch (error) {
        return { ok: false, error };
      }
    }
  );
  const attemptById = new Map(pending.map((pick, i) => [pick.id, attempts[i]]));

  const summary: SettlementSummary = {
    checked: pending.length,
    settled: 0,
    pending: 0,
    unmatched: 0,
    notAvailable: 0,
    failed: 0,
    results: [],
    issues: [],
  };

  const report = (pick: Pick, kind: SettlementIssueKind, message: string) => {
    summary.issues.push({ pickId: pick.id, event: describeEvent(pick), kind, message });
  };

  // Apply in ledger order, one pick at a time
  const updated = picks.map((pick): Pick => {
    const attempt = attemptById.get(pick.id);
    if (pick.status !== 'pending' || !attempt) return pick;

    if (!attempt.ok) {
      summary.failed++;
      const message = `lookup failed: ${errorMessage(attempt.error)}`;
      console.error(`${TAG} ${describeEvent(pick)}: ${message}`);
      report(pick, 'failed', message);
      return pick;
    }

    const { result } = attempt;
    switch (result.kind) {
      case 'not_available': {
        summary.notAvailable++;
        const message = `result not available (${result.reason}${result.detail ? `: ${result.detail}` : ''})`;
        console.log(`${TAG} ${describeEvent(pick)}: ${message}`);
        report(pick, 'not_available', message);
        return pick;
      }

      case 'no_match': {
        summary.unmatched++;
        const candidates = result.candidates.length > 0 ? `; candidates: ${result.candidates.join(', ')}` : '';
        const message = `no matching event (${result.reason})${candidates}`;
        console.warn(`${TAG} ⚠️ ${describeEvent(pick)}: ${message}`);
        report(pick, 'no_match', message);
        return pick;
      }

      case 'outcome': {
        let status: SettledStatus;
        try {
          status = gradePick(pick, result.outcome);
        } catch (error) {
          summary.failed++;
          const message = `cannot grade: ${errorMessage(error)}`;
          console.error(`${TAG} ${describeEvent(pick)}: ${message}`);
          report(pick, 'failed', message);
          return pick;
        }

        const settled = applySettlement(pick, status, now());
        summary.settled++;
        summary.results.push({ pickId: pick.id, status, profitLoss: settled.profit_loss });
        console.log(
          `${TAG} Settled: ${describeEvent(pick)} ${pick.prediction} → ${status} (${settled.profit_loss >= 0 ? '+' : ''}$${settled.profit_loss.toFixed(2)})`
        );
        return settled;
      }
    }
  });

  summary.pending = updated.filter(p => p.status === 'pending').length;

  const duration = Date.now() - startTime;
  console.log(`${TAG} Complete in ${duration}ms: ${summary.settled} settled, ${summary.pending} pending, ${summary.unmatched} unmatched`);

  return { picks: updated, summary };
}
