import type { Pick } from './picks.ts';

export type WindowKind = 'day' | 'week' | 'month' | 'all';

export interface ReportWindow {
  kind: WindowKind;
  label: string;
  start: Date | null;   // inclusive; null = unbounded
  end: Date | null;     // exclusive; null = unbounded
}

export interface StatusCounts {
  win: number;
  loss: number;
  push: number;
  void: number;
}

export interface OpenExposure {
  count: number;
  totalStaked: number;
}

export interface PerformanceReport {
  window: ReportWindow;
  counts: StatusCounts;
  settled: number;
  totalStaked: number;
  netProfit: number;
  roi: number;          // fraction: 0.146 = 14.6%
  winRate: number;      // wins / (wins + losses)
  openExposure: OpenExposure;
  picks: Pick[];        // settled picks in the window, oldest settlement first
}
