import { describe, expect, it } from 'vitest';
import { InvalidPickError, MalformedLedgerError } from '../lib/errors.ts';
import { createPick, parsePickRecord, serializePick } from '../lib/ledger/pick-record.ts';
import { applySettlement } from '../lib/settlement/settle-picks.ts';
import { pickRecord } from './fixtures/picks.ts';

describe('parsePickRecord', () => {
  it('parses a spread prediction into side and line', () => {
    const pick = parsePickRecord(pickRecord());
    expect(pick.bet_type).toBe('Spread');
    if (pick.bet_type !== 'Spread') return;
    expect(pick.side).toBe('New York Yankees');
    expect(pick.line).toBe(-3.5);
    expect(pick.event.participants).toEqual(['New York Yankees', 'Boston Red Sox']);
  });

  it('reads pick-em spreads as a zero line', () => {
    const pick = parsePickRecord(pickRecord({ prediction: 'Boston Red Sox PK' }));
    expect(pick.bet_type === 'Spread' && pick.line).toBe(0);
  });

  it('parses totals and moneylines', () => {
    const total = parsePickRecord(pickRecord({ bet_type: 'Total', prediction: 'Under 8.5' }));
    expect(total).toMatchObject({ bet_type: 'Total', direction: 'under', line: 8.5 });

    const draw = parsePickRecord(pickRecord({ bet_type: 'Moneyline', prediction: 'Draw', sport: 'Soccer' }));
    expect(draw).toMatchObject({ bet_type: 'Moneyline', selection: 'Draw', isDraw: true });
  });

  it('splits a legacy "game" title into participants', () => {
    const pick = parsePickRecord(pickRecord({ event: { game: 'Yankees vs Red Sox', date: '2026-10-18' } }));
    expect(pick.event.participants).toEqual(['Yankees', 'Red Sox']);
  });

  it('treats absent odds as a confidence-only pick', () => {
    const record = pickRecord();
    delete record.odds;
    expect(parsePickRecord(record).odds).toBeNull();
  });

  it('assigns an id when the record has none', () => {
    const record = pickRecord();
    delete record.id;
    expect(parsePickRecord(record).id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('reads null optional strings as absent', () => {
    const pick = parsePickRecord(
      pickRecord({ league: null, event: { participants: ['New York Yankees', 'Boston Red Sox'], date: '2026-10-18', time: null, venue: null } })
    );
    expect(pick.league).toBeUndefined();
    expect(pick.event.time).toBeUndefined();
    expect(pick.event.venue).toBeUndefined();
  });

  it.each(['sport', 'event', 'bet_type', 'prediction', 'status'])('rejects a record missing "%s"', field => {
    const record = pickRecord();
    delete record[field];
    expect(() => parsePickRecord(record, 3)).toThrow(`record 3: missing required field "${field}"`);
  });

  it.each([
    ['unknown bet type', { bet_type: 'Parlay' }],
    ['unknown status', { status: 'won' }],
    ['odds below 1.0', { odds: 0.5 }],
    ['negative stake', { stake: -5 }],
    ['spread without a line', { prediction: 'New York Yankees' }],
    ['bad event date', { event: { participants: ['A Team', 'B Team'], date: '18/10/2026' } }],
    ['three participants', { event: { participants: ['A', 'B', 'C'], date: '2026-10-18' } }],
    ['pending with settled_at', { settled_at: '2026-10-18T23:00:00.000Z' }],
    ['pending with profit', { profit_loss: 5 }],
    ['settled without settled_at', { status: 'win', profit_loss: 9.1 }],
    ['void with profit', { status: 'void', profit_loss: 3, settled_at: '2026-10-18T23:00:00.000Z' }],
    ['push with profit', { status: 'push', profit_loss: 2, settled_at: '2026-10-18T23:00:00.000Z' }],
    ['loss that keeps the stake', { status: 'loss', profit_loss: 0, settled_at: '2026-10-18T23:00:00.000Z' }],
    ['win without odds but with profit', { status: 'win', odds: null, profit_loss: 9.1, settled_at: '2026-10-18T23:00:00.000Z' }],
  ])('rejects %s', (_label, overrides) => {
    expect(() => parsePickRecord(pickRecord(overrides))).toThrow(MalformedLedgerError);
  });

  it('rejects a settled profit that does not follow from stake and odds', () => {
    const record = pickRecord({ status: 'win', profit_loss: 50, settled_at: '2026-10-18T23:00:00.000Z' });
    expect(() => parsePickRecord(record, 2)).toThrow('record 2: win pick has profit_loss 50, expected 9.1');
  });

  it('accepts settled profits within half a cent', () => {
    const pick = parsePickRecord(pickRecord({ status: 'win', profit_loss: 9.100000000000001, settled_at: '2026-10-18T23:00:00.000Z' }));
    expect(pick.profit_loss).toBe(9.100000000000001);
  });
});

describe('serializePick', () => {
  it('writes back unknown fields, including nested event fields', () => {
    const record = pickRecord({
      event: { participants: ['New York Yankees', 'Boston Red Sox'], date: '2026-10-18', venue: 'Yankee Stadium', broadcast: 'TBS' },
      confidence: 0.72,
      tags: ['model-v2'],
    });

    expect(serializePick(parsePickRecord(record))).toEqual(record);
  });

  it('round-trips a settled pick', () => {
    const record = pickRecord({
      league: 'MLB',
      status: 'win',
      profit_loss: 9.1,
      settled_at: '2026-10-19T02:00:00.000Z',
      created_at: '2026-10-18T12:00:00.000Z',
    });

    expect(serializePick(parsePickRecord(record))).toEqual(record);
  });

  it('writes null optional fields back as null', () => {
    const record = pickRecord({
      league: null,
      event: { participants: ['New York Yankees', 'Boston Red Sox'], date: '2026-10-18', time: null, name: null },
      stake: null,
      created_at: null,
    });

    expect(serializePick(parsePickRecord(record))).toEqual(record);
  });

  it('does not write an id it generated', () => {
    const record = pickRecord();
    delete record.id;

    const written = serializePick(parsePickRecord(record));

    expect(written).toEqual(record);
    expect(Object.hasOwn(written, 'id')).toBe(false);
  });

  it('adds the settlement fields a pending record left out once it settles', () => {
    const record = {
      id: 'min-1',
      sport: 'MLB',
      event: { participants: ['New York Yankees', 'Boston Red Sox'], date: '2026-10-18' },
      bet_type: 'Moneyline',
      prediction: 'Boston Red Sox',
      stake: 10,
      status: 'pending',
    };

    const settled = applySettlement(parsePickRecord(record), 'loss', new Date('2026-10-19T08:00:00.000Z'));

    expect(serializePick(settled)).toEqual({
      ...record,
      status: 'loss',
      profit_loss: -10,
      settled_at: '2026-10-19T08:00:00.000Z',
    });
  });
});

describe('createPick', () => {
  it('builds a pending pick with a creation time', () => {
    const pick = createPick(
      {
        sport: 'NBA',
        participants: ['Boston Celtics', 'Miami Heat'],
        date: '2026-10-20',
        betType: 'Total',
        prediction: 'Over 215.5',
        odds: 1.87,
        stake: 25,
      },
      new Date('2026-10-19T15:00:00.000Z')
    );

    expect(pick).toMatchObject({
      status: 'pending',
      profit_loss: 0,
      settled_at: null,
      created_at: '2026-10-19T15:00:00.000Z',
      direction: 'over',
      line: 215.5,
    });
    expect(serializePick(pick).event).toEqual({ participants: ['Boston Celtics', 'Miami Heat'], date: '2026-10-20' });
  });

  it('rejects invalid input as an InvalidPickError', () => {
    expect(() =>
      createPick({ sport: 'NBA', participants: ['Boston Celtics'], date: '2026-10-20', betType: 'Prop', prediction: 'x' })
    ).toThrow(InvalidPickError);
  });
});
