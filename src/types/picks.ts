export type BetType = 'Moneyline' | 'Spread' | 'Total' | 'Win';
export type PickStatus = 'pending' | 'win' | 'loss' | 'push' | 'void';
export type SettledStatus = Exclude<PickStatus, 'pending'>;
export type TotalDirection = 'over' | 'under';

export const BET_TYPES: readonly BetType[] = ['Moneyline', 'Spread', 'Total', 'Win'];
export const PICK_STATUSES: readonly PickStatus[] = ['pending', 'win', 'loss', 'push', 'void'];

export interface PickEvent {
  participants: string[];     // 1 (individual selection) or 2 (head-to-head)
  date: string;               // yyyy-MM-dd, scheduled calendar day
  time?: string;
  venue?: string;
  name?: string;
  raw: Record<string, unknown>; // event object as read, written back verbatim
}

interface PickBase {
  id: string;
  sport: string;
  league?: string;
  event: PickEvent;
  prediction: string;
  odds: number | null;        // decimal odds; null for confidence-only picks
  stake: number;
  status: PickStatus;
  profit_loss: number;
  settled_at: string | null;
  created_at?: string;
  extras: Record<string, unknown>; // unrecognized top-level fields
  sourceFields: Record<string, unknown>; // known top-level fields as read, for write-back
}

export interface MoneylinePick extends PickBase {
  bet_type: 'Moneyline';
  selection: string;          // participant name or "Draw"
  isDraw: boolean;
}

export interface SpreadPick extends PickBase {
  bet_type: 'Spread';
  side: string;
  line: number;               // negative favours the predicted side
}

export interface TotalPick extends PickBase {
  bet_type: 'Total';
  direction: TotalDirection;
  line: number;
}

export interface WinPick extends PickBase {
  bet_type: 'Win';
  selection: string;
}

export type Pick = MoneylinePick | SpreadPick | TotalPick | WinPick;

export interface NewPickInput {
  sport: string;
  league?: string;
  participants: string[];
  date: string;
  time?: string;
  venue?: string;
  betType: string;
  prediction: string;
  odds?: number | null;
  stake?: number;
}
