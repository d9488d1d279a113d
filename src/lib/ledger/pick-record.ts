// ============================================================================
// PICK RECORDS
// ============================================================================
// Conversion between ledger file records and typed picks. Parsing is strict:
// a record that is missing a required field or breaks a status invariant
// fails the whole ledger. Fields this module does not know about are kept in
// `extras` and written back unchanged; known fields missing from a record stay
// missing on write until settlement gives them a value.
// ============================================================================

import { randomUUID } from 'node:crypto';
import { isValid, parseISO } from 'date-fns';
import { InvalidPickError, MalformedLedgerError } from '../errors.ts';
import { splitTeams } from '../results/canonicalize.ts';
import { calculateProfitLoss } from '../settlement/grade-pick.ts';
import {
  BET_TYPES,
  PICK_STATUSES,
  type BetType,
  type NewPickInput,
  type Pick,
  type PickEvent,
  type PickStatus,
} from '../../types/picks.ts';

const KNOWN_FIELDS = new Set([
  'id', 'sport', 'league', 'event', 'bet_type', 'prediction', 'odds',
  'stake', 'status', 'profit_loss', 'settled_at', 'created_at',
]);

// Settled amounts may carry float noise from other writers
const PROFIT_TOLERANCE = 0.005;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const SPREAD_PATTERN = /^(.+?)\s+([+-]?\d+(?:\.\d+)?)$/;
const PICKEM_PATTERN = /^(.+?)\s+(?:pk|pick|ev)$/i;
const TOTAL_PATTERN = /^(over|under|o|u)\s*(\d+(?:\.\d+)?)$/i;
const DRAW_PATTERN = /^(?:draw|tie)$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBetType(value: unknown): value is BetType {
  return BET_TYPES.some(t => t === value);
}

function isPickStatus(value: unknown): value is PickStatus {
  return PICK_STATUSES.some(s => s === value);
}

function isTimestamp(value: string): boolean {
  return isValid(parseISO(value));
}

class RecordReader {
  constructor(private readonly record: Record<string, unknown>, private readonly index?: number) {}

  fail(message: string): never {
    throw new MalformedLedgerError(message, this.index);
  }

  requiredString(key: string, source: Record<string, unknown> = this.record): string {
    const value = source[key];
    if (value === undefined || value === null) this.fail(`missing required field "${key}"`);
    if (typeof value !== 'string' || value.trim().length === 0) this.fail(`"${key}" must be a non-empty string`);
    return value;
  }

  optionalString(key: string, source: Record<string, unknown> = this.record): string | undefined {
    const value = source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') this.fail(`"${key}" must be a string`);
    return value;
  }

  optionalNumber(key: string): number | null {
    const value = this.record[key];
    if (value === undefined || value === null) return null;
    if (typeof value !== 'number' || !Number.isFinite(value)) this.fail(`"${key}" must be a number`);
    return value;
  }

  optionalTimestamp(key: string): string | null {
    const value = this.record[key];
    if (value === undefined || value === null) return null;
    if (typeof value !== 'string' || !isTimestamp(value)) this.fail(`"${key}" must be an ISO-8601 timestamp`);
    return value;
  }

  event(): PickEvent {
    const raw = this.record.event;
    if (raw === undefined || raw === null) this.fail('missing required field "event"');
    if (!isRecord(raw)) this.fail('"event" must be an object');

    let participants: string[];
    if (raw.participants !== undefined) {
      const list = raw.participants;
      if (
        !Array.isArray(list) ||
        list.length < 1 ||
        list.length > 2 ||
        !list.every((p): p is string => typeof p === 'string' && p.trim().length > 0)
      ) {
        this.fail('"event.participants" must list one or two names');
      }
      participants = list.map(p => p.trim());
    } else if (typeof raw.game === 'string' && raw.game.trim().length > 0) {
      const teams = splitTeams(raw.game);
      participants = teams ? [teams.a, teams.b] : [raw.game.trim()];
    } else {
      this.fail('"event" needs "participants" or "game"');
    }

    const date = this.requiredString('date', raw);
    if (!DATE_PATTERN.test(date) || !isValid(parseISO(date))) this.fail('"event.date" must be yyyy-MM-dd');

    return {
      participants,
      date,
      time: this.optionalString('time', raw),
      venue: this.optionalString('venue', raw),
      name: this.optionalString('name', raw),
      raw,
    };
  }
}

/**
 * Parse one ledger record. `index` is only used in error messages.
 */
export function parsePickRecord(value: unknown, index?: number): Pick {
  if (!isRecord(value)) {
    throw new MalformedLedgerError('pick must be an object', index);
  }
  const reader: RecordReader = new RecordReader(value, index);

  const sport = reader.requiredString('sport');
  const event = reader.event();

  if (value.bet_type === undefined || value.bet_type === null) reader.fail('missing required field "bet_type"');
  if (!isBetType(value.bet_type)) reader.fail(`unknown bet_type ${JSON.stringify(value.bet_type)}`);
  const betType = value.bet_type;

  const prediction = reader.requiredString('prediction');

  if (value.status === undefined || value.status === null) reader.fail('missing required field "status"');
  if (!isPickStatus(value.status)) reader.fail(`unknown status ${JSON.stringify(value.status)}`);
  const status = value.status;

  const id = value.id === undefined ? randomUUID() : reader.requiredString('id');
  const odds = reader.optionalNumber('odds');
  if (odds !== null && odds < 1) reader.fail('"odds" must be decimal odds of at least 1.0');
  const stake = reader.optionalNumber('stake') ?? 0;
  if (stake < 0) reader.fail('"stake" must not be negative');
  const profitLoss = reader.optionalNumber('profit_loss') ?? 0;
  const settledAt = reader.optionalTimestamp('settled_at');
  const createdAt = reader.optionalTimestamp('created_at') ?? undefined;

  if (status === 'pending') {
    if (settledAt !== null) reader.fail('pending pick must not have "settled_at"');
    if (profitLoss !== 0) reader.fail('pending pick must have profit_loss 0');
  } else {
    if (settledAt === null) reader.fail(`${status} pick is missing "settled_at"`);
    const expected = calculateProfitLoss(status, stake, odds);
    if (Math.abs(profitLoss - expected) > PROFIT_TOLERANCE) {
      reader.fail(`${status} pick has profit_loss ${profitLoss}, expected ${expected}`);
    }
  }

  const extras: Record<string, unknown> = {};
  const sourceFields: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    if (KNOWN_FIELDS.has(key)) sourceFields[key] = field;
    else extras[key] = field;
  }

  const base = {
    id,
    sport,
    league: reader.optionalString('league'),
    event,
    prediction,
    odds,
    stake,
    status,
    profit_loss: profitLoss,
    settled_at: settledAt,
    created_at: createdAt,
    extras,
    sourceFields,
  };

  const text = prediction.trim();
  switch (betType) {
    case 'Moneyline':
      return { ...base, bet_type: 'Moneyline', selection: text, isDraw: DRAW_PATTERN.test(text) };

    case 'Spread': {
      const pickem = text.match(PICKEM_PATTERN);
      if (pickem) return { ...base, bet_type: 'Spread', side: pickem[1].trim(), line: 0 };
      const spread = text.match(SPREAD_PATTERN);
      if (!spread) reader.fail(`Spread prediction "${prediction}" must look like "<side> <line>"`);
      return { ...base, bet_type: 'Spread', side: spread[1].trim(), line: Number(spread[2]) };
    }

    case 'Total': {
      const total = text.match(TOTAL_PATTERN);
      if (!total) reader.fail(`Total prediction "${prediction}" must look like "Over <line>" or "Under <line>"`);
      const direction = total[1].toLowerCase().startsWith('o') ? 'over' : 'under';
      return { ...base, bet_type: 'Total', direction, line: Number(total[2]) };
    }

    case 'Win':
      return { ...base, bet_type: 'Win', selection: text };
  }
}

/**
 * Record as written to the ledger file. Known fields come first in a fixed
 * order, followed by the extras in their original order.
 *
 * An optional field is written when the record it was read from had it, or
 * when its value has moved off the default a missing field reads as. A field
 * read as `null` is written back as `null` while it still holds that default.
 * Ids generated for records without one are never written.
 */
export function serializePick(pick: Pick): Record<string, unknown> {
  const optional = (key: string, value: unknown, fallback: unknown): Record<string, unknown> => {
    if (Object.hasOwn(pick.sourceFields, key)) {
      return { [key]: pick.sourceFields[key] === null && value === fallback ? null : value };
    }
    return value === fallback ? {} : { [key]: value };
  };

  const record = {
    ...optional('id', pick.id, pick.id),
    sport: pick.sport,
    ...optional('league', pick.league, undefined),
    event: pick.event.raw,
    bet_type: pick.bet_type,
    prediction: pick.prediction,
    ...optional('odds', pick.odds, null),
    ...optional('stake', pick.stake, 0),
    status: pick.status,
    ...optional('profit_loss', pick.profit_loss, 0),
    ...optional('settled_at', pick.settled_at, null),
    ...optional('created_at', pick.created_at, undefined),
  };
  return { ...record, ...pick.extras };
}

/**
 * Build a new pending pick from operator input, validated with the same rules
 * as a ledger record.
 */
export function createPick(input: NewPickInput, now: Date = new Date()): Pick {
  const event: Record<string, unknown> = {
    participants: input.participants,
    date: input.date,
  };
  if (input.time !== undefined) event.time = input.time;
  if (input.venue !== undefined) event.venue = input.venue;

  const record: Record<string, unknown> = {
    id: randomUUID(),
    sport: input.sport,
    event,
    bet_type: input.betType,
    prediction: input.prediction,
    odds: input.odds ?? null,
    stake: input.stake ?? 0,
    status: 'pending',
    profit_loss: 0,
    settled_at: null,
    created_at: now.toISOString(),
  };
  if (input.league !== undefined) record.league = input.league;

  try {
    return parsePickRecord(record);
  } catch (err) {
    if (err instanceof MalformedLedgerError) throw new InvalidPickError(err.message);
    throw err;
  }
}
