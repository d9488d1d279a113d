import { InvalidPickError, errorMessage } from '../lib/errors.ts';
import type { PickLedger } from '../lib/ledger/pick-ledger.ts';
import { createPick } from '../lib/ledger/pick-record.ts';
import { splitTeams } from '../lib/results/canonicalize.ts';

const TAG = '[ADD-PICK]';

export interface AddPickArgs {
  sport?: string;
  league?: string;
  event?: string;
  date?: string;
  time?: string;
  venue?: string;
  betType?: string;
  prediction?: string;
  odds?: string;
  stake?: string;
}

function required(value: string | undefined, flag: string): string {
  if (value === undefined || value.trim() === '') {
    throw new InvalidPickError(`--${flag} is required`);
  }
  return value.trim();
}

function optionalNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidPickError(`--${flag} must be a number, got "${value}"`);
  }
  return parsed;
}

export async function addPick(ledger: PickLedger, args: AddPickArgs, now: () => Date = () => new Date()): Promise<number> {
  try {
    const eventTitle = required(args.event, 'event');
    const teams = splitTeams(eventTitle);

    const pick = createPick(
      {
        sport: required(args.sport, 'sport'),
        league: args.league,
        participants: teams ? [teams.a, teams.b] : [eventTitle],
        date: required(args.date, 'date'),
        time: args.time,
        venue: args.venue,
        betType: required(args.betType, 'bet-type'),
        prediction: required(args.prediction, 'prediction'),
        odds: optionalNumber(args.odds, 'odds'),
        stake: optionalNumber(args.stake, 'stake'),
      },
      now()
    );

    const picks = await ledger.load();
    await ledger.save([...picks, pick]);
    console.log(`${TAG} Added ${pick.id}: ${pick.event.participants.join(' vs ')} ${pick.bet_type} ${pick.prediction}`);
    return 0;
  } catch (error) {
    console.error(`${TAG} Error: ${errorMessage(error)}`);
    return 1;
  }
}
