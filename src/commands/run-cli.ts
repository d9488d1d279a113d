import { parseArgs } from 'node:util';
import { loadConfig, type AppConfig } from '../lib/config.ts';
import { errorMessage } from '../lib/errors.ts';
import { PickLedger } from '../lib/ledger/pick-ledger.ts';
import type { ResultsSource } from '../types/results.ts';
import { addPick } from './add-pick.ts';
import { showReport } from './report.ts';
import { createResultsSource, updateResults } from './update-results.ts';

export const USAGE = `Usage:
  update-results                       settle pending picks
  report [daily|weekly|monthly|all]    print a performance report (default: all)
  add-pick --sport <s> --event "<A vs B>" --date <yyyy-MM-dd>
           --bet-type <Moneyline|Spread|Total|Win> --prediction <p>
           [--odds <decimal>] [--stake <amount>] [--league <l>] [--time <t>] [--venue <v>]

Options:
  --file <path>   ledger file (default: $PICKS_FILE or my_picks.json)`;

export interface CliDeps {
  env?: Record<string, string | undefined>;
  source?: ResultsSource;
  now?: () => Date;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      file: { type: 'string' },
      sport: { type: 'string' },
      league: { type: 'string' },
      event: { type: 'string' },
      date: { type: 'string' },
      time: { type: 'string' },
      venue: { type: 'string' },
      'bet-type': { type: 'string' },
      prediction: { type: 'string' },
      odds: { type: 'string' },
      stake: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/**
 * Run one command and return its exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(`${errorMessage(error)}\n\n${USAGE}`);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    console.error(`[CONFIG] Error: ${errorMessage(error)}`);
    return 1;
  }
  const ledger = new PickLedger(values.file ?? config.picksFile);

  switch (command) {
    case 'update-results':
      return updateResults({
        ledger,
        source: () => deps.source ?? createResultsSource(config),
        concurrency: config.concurrency,
        now: deps.now,
      });

    case 'report':
      return showReport({ ledger, window: rest[0] ?? 'all', now: deps.now });

    case 'add-pick':
      return addPick(
        ledger,
        {
          sport: values.sport,
          league: values.league,
          event: values.event,
          date: values.date,
          time: values.time,
          venue: values.venue,
          betType: values['bet-type'],
          prediction: values.prediction,
          odds: values.odds,
          stake: values.stake,
        },
        deps.now
      );

    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}
