// ============================================================================
// GRADING
// ============================================================================
// Turns a final outcome into a win / loss / push / void per bet type, and the
// status into a profit/loss.
// ============================================================================

import { OutcomeMismatchError } from '../errors.ts';
import { roundMoney } from '../money.ts';
import { namesAgree, resolveTeamName } from '../results/canonicalize.ts';
import { getSportConfig, type SportConfig } from '../results/sports-config.ts';
import type {
  MoneylinePick,
  Pick,
  SettledStatus,
  SpreadPick,
  TotalPick,
  WinPick,
} from '../../types/picks.ts';
import type { Outcome, OutcomeParticipant } from '../../types/results.ts';

// Scores and lines are at most one decimal place; anything smaller is float noise
const EPSILON = 1e-9;

function sign(value: number): -1 | 0 | 1 {
  if (Math.abs(value) < EPSILON) return 0;
  return value > 0 ? 1 : -1;
}

function fromSign(value: -1 | 0 | 1): SettledStatus {
  if (value === 0) return 'push';
  return value > 0 ? 'win' : 'loss';
}

/**
 * Index of `name` in the outcome. Looked up among the pick's own participants
 * first (the outcome follows their order), then among the provider's names.
 */
function locate(name: string, pick: Pick, outcome: Outcome, sport: SportConfig | null): number {
  const wanted = resolveTeamName(name, sport);

  const own = pick.event.participants
    .map((p, i) => (namesAgree(wanted, resolveTeamName(p, sport)) ? i : -1))
    .filter(i => i >= 0 && i < outcome.participants.length);
  if (own.length === 1) return own[0];

  const provider = outcome.participants
    .map((p, i) => (namesAgree(wanted, resolveTeamName(p.name, sport)) ? i : -1))
    .filter(i => i >= 0);
  if (provider.length === 1) return provider[0];

  const names = outcome.participants.map(p => p.name).join(' vs ');
  throw new OutcomeMismatchError(`"${name}" is not a participant of ${names}`);
}

function headToHead(index: number, outcome: Outcome): { own: OutcomeParticipant; opponent: OutcomeParticipant } {
  if (outcome.participants.length !== 2) {
    throw new OutcomeMismatchError(`expected two participants, got ${outcome.participants.length}`);
  }
  return {
    own: outcome.participants[index],
    opponent: outcome.participants[1 - index],
  };
}

function gradeMoneyline(pick: MoneylinePick, outcome: Outcome, sport: SportConfig | null): SettledStatus {
  if (pick.isDraw) {
    const { own, opponent } = headToHead(0, outcome);
    return sign(own.score - opponent.score) === 0 ? 'win' : 'loss';
  }

  const { own, opponent } = headToHead(locate(pick.selection, pick, outcome, sport), outcome);
  const result = sign(own.score - opponent.score);
  if (result !== 0) return fromSign(result);

  if (sport?.allowsDraw) return 'push';
  throw new OutcomeMismatchError(`tie ${own.score}-${opponent.score} reported for ${pick.sport}, which has no draws`);
}

function gradeSpread(pick: SpreadPick, outcome: Outcome, sport: SportConfig | null): SettledStatus {
  const { own, opponent } = headToHead(locate(pick.side, pick, outcome, sport), outcome);
  return fromSign(sign(own.score - opponent.score + pick.line));
}

function gradeTotal(pick: TotalPick, outcome: Outcome): SettledStatus {
  const combined = outcome.participants.reduce((sum, p) => sum + p.score, 0);
  return fromSign(pick.direction === 'over' ? sign(combined - pick.line) : sign(pick.line - combined));
}

function gradeWin(pick: WinPick, outcome: Outcome, sport: SportConfig | null): SettledStatus {
  const wanted = resolveTeamName(pick.selection, sport);

  if (outcome.winner) {
    return namesAgree(wanted, resolveTeamName(outcome.winner, sport)) ? 'win' : 'loss';
  }

  const top = Math.max(...outcome.participants.map(p => p.score));
  const leaders = outcome.participants.filter(p => sign(p.score - top) === 0);
  if (leaders.length !== 1) {
    throw new OutcomeMismatchError('outcome names no winner and the top score is shared');
  }
  const index = locate(pick.selection, pick, outcome, sport);
  return outcome.participants[index] === leaders[0] ? 'win' : 'loss';
}

/**
 * Grade a pick against its event's outcome.
 * Throws OutcomeMismatchError when the outcome cannot be applied to the pick.
 */
export function gradePick(pick: Pick, outcome: Outcome): SettledStatus {
  if (outcome.status === 'cancelled') return 'void';

  const sport = getSportConfig(pick.sport, pick.league);
  switch (pick.bet_type) {
    case 'Moneyline':
      return gradeMoneyline(pick, outcome, sport);
    case 'Spread':
      return gradeSpread(pick, outcome, sport);
    case 'Total':
      return gradeTotal(pick, outcome);
    case 'Win':
      return gradeWin(pick, outcome, sport);
  }
}

/**
 * Profit/loss for a settled pick, rounded to cents.
 * A win without odds is a confidence-only pick and pays nothing.
 */
export function calculateProfitLoss(status: SettledStatus, stake: number, odds: number | null): number {
  if (status === 'win') {
    return odds === null ? 0 : roundMoney(stake * (odds - 1));
  } else if (status === 'loss') {
    return roundMoney(-stake);
  }
  // push / void = 0 (stake returned)
  return 0;
}
