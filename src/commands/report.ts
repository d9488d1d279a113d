import { errorMessage } from '../lib/errors.ts';
import type { PickLedger } from '../lib/ledger/pick-ledger.ts';
import { formatReport } from '../lib/reporting/format-report.ts';
import { buildReport } from '../lib/reporting/performance-report.ts';
import { parseWindow } from '../lib/reporting/report-windows.ts';

const TAG = '[REPORT]';

export interface ReportOptions {
  ledger: PickLedger;
  window: string;
  now?: () => Date;
}

export async function showReport(options: ReportOptions): Promise<number> {
  try {
    const kind = parseWindow(options.window);
    const picks = await options.ledger.load();
    if (picks.length === 0) {
      console.log('No picks found.');
      return 0;
    }

    const report = buildReport(picks, kind, options.now ? options.now() : new Date());
    console.log(formatReport(report));
    return 0;
  } catch (error) {
    console.error(`${TAG} Error: ${errorMessage(error)}`);
    return 1;
  }
}
