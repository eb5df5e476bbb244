// Ledger Logger - Append-only cycle outcome ledgers
// JSONL format, one record per line
// No mutation, no deletion

import * as fs from 'fs/promises';
import * as path from 'path';
import { LedgerPort } from '../../../domain/ports/ledger';
import { FailureRecord, LedgerRecord, SuccessRecord } from '../../../domain/types/types';
import { errorMessage } from '../../../domain/errors';
import { countLines } from '../../connectors/os/executors/fileSystem';

/**
 * Append one record to a ledger file, creating its directory if needed
 */
export async function appendLedgerRecord(ledgerPath: string, record: LedgerRecord): Promise<void> {
  const line = JSON.stringify(record) + '\n';

  try {
    await fs.mkdir(path.dirname(ledgerPath), { recursive: true });
    await fs.appendFile(ledgerPath, line, 'utf8');
  } catch (error) {
    throw new Error(`Failed to append ledger record to ${ledgerPath}: ${errorMessage(error)}`);
  }
}

export class LedgerLogger implements LedgerPort {
  constructor(
    private readonly successPath: string,
    private readonly errorPath: string
  ) {}

  async appendSuccess(record: SuccessRecord): Promise<void> {
    await appendLedgerRecord(this.successPath, record);
  }

  async appendFailure(record: FailureRecord): Promise<void> {
    await appendLedgerRecord(this.errorPath, record);
  }

  async countSuccesses(): Promise<number> {
    return countLines(this.successPath);
  }

  async countFailures(): Promise<number> {
    return countLines(this.errorPath);
  }
}
