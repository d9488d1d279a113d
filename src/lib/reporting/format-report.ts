import { formatMoney } from '../money.ts';
import type { PerformanceReport } from '../../types/report.ts';

const RULE = '-'.repeat(40);

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

/**
 * Plain text block printed by the `report` command.
 */
export function formatReport(report: PerformanceReport): string {
  const { counts, openExposure } = report;
  return [
    `--- Performance Report: ${report.window.label} ---`,
    RULE,
    `Record (W-L-P-V):     ${counts.win}-${counts.loss}-${counts.push}-${counts.void}`,
    `Total Amount Staked:  ${formatMoney(report.totalStaked)}`,
    `Total Profit/Loss:    ${formatMoney(report.netProfit)}`,
    `Return on Investment: ${percent(report.roi)}`,
    `Win Rate:             ${percent(report.winRate)}`,
    `Open Picks:           ${openExposure.count} (${formatMoney(openExposure.totalStaked)} staked)`,
    RULE,
  ].join('\n');
}
