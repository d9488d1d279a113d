import { parseISO } from 'date-fns';
import { roundMoney } from '../money.ts';
import type { Pick } from '../../types/picks.ts';
import type { PerformanceReport, ReportWindow, StatusCounts, WindowKind } from '../../types/report.ts';
import { isInWindow, resolveWindow } from './report-windows.ts';

function roundRatio(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/** When a pending pick was opened: created_at, else the start of its event day. */
function openedAt(pick: Pick): Date {
  return parseISO(pick.created_at ?? pick.event.date);
}

/**
 * Aggregate settled picks whose settlement falls inside the window. Pending
 * picks opened inside the window are reported as open exposure only.
 * Never mutates the ledger.
 */
export function buildReport(picks: Pick[], window: WindowKind | ReportWindow, now: Date = new Date()): PerformanceReport {
  const range = typeof window === 'string' ? resolveWindow(window, now) : window;

  const settled = picks
    .filter(p => p.status !== 'pending' && p.settled_at !== null && isInWindow(parseISO(p.settled_at), range))
    .sort((a, b) => (a.settled_at ?? '').localeCompare(b.settled_at ?? '') || a.id.localeCompare(b.id));

  const open = picks.filter(p => p.status === 'pending' && isInWindow(openedAt(p), range));

  const counts: StatusCounts = { win: 0, loss: 0, push: 0, void: 0 };
  let staked = 0;
  let profit = 0;
  for (const pick of settled) {
    if (pick.status !== 'pending') counts[pick.status]++;
    staked += pick.stake;
    profit += pick.profit_loss;
  }

  const totalStaked = roundMoney(staked);
  const netProfit = roundMoney(profit);
  const decided = counts.win + counts.loss;

  return {
    window: range,
    counts,
    settled: settled.length,
    totalStaked,
    netProfit,
    roi: totalStaked > 0 ? roundRatio(netProfit / totalStaked) : 0,
    winRate: decided > 0 ? roundRatio(counts.win / decided) : 0,
    openExposure: {
      count: open.length,
      totalStaked: roundMoney(open.reduce((sum, p) => sum + p.stake, 0)),
    },
    picks: settled,
  };
}
