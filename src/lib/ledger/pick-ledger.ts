import { randomBytes } from 'node:crypto';
import { open, readFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { MalformedLedgerError, errorMessage } from '../errors.ts';
import type { Pick } from '../../types/picks.ts';
import { parsePickRecord, serializePick } from './pick-record.ts';

const TAG = '[LEDGER]';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Parse a decoded ledger document. Any bad record fails the whole ledger.
 */
export function parseLedger(data: unknown): Pick[] {
  if (!Array.isArray(data)) {
    throw new MalformedLedgerError('ledger must be a JSON array of picks');
  }

  const picks = data.map((record: unknown, index) => parsePickRecord(record, index));

  const seen = new Set<string>();
  picks.forEach((pick, index) => {
    if (seen.has(pick.id)) {
      throw new MalformedLedgerError(`duplicate id "${pick.id}"`, index);
    }
    seen.add(pick.id);
  });

  return picks;
}

/**
 * JSON file holding every pick for one operator.
 */
export class PickLedger {
  constructor(readonly filePath: string) {}

  /** A missing file is an empty ledger. */
  async load(): Promise<Pick[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        console.log(`${TAG} No ledger at ${this.filePath}, starting empty`);
        return [];
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new MalformedLedgerError(`${this.filePath} is not valid JSON: ${errorMessage(err)}`);
    }

    return parseLedger(data);
  }

  /**
   * Write to a temp file beside the ledger, flush it, then rename it over the
   * ledger. Readers see either the old file or the new one.
   */
  async save(picks: Pick[]): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tempPath = path.join(
      dir,
      `.${path.basename(this.filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
    );
    const body = `${JSON.stringify(picks.map(serializePick), null, 2)}\n`;

    try {
      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(body, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.filePath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }
  }
}
