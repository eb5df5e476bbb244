// Port: Ledger
// Append-only outcome records, one per completed cycle

import { FailureRecord, SuccessRecord } from '../types/types';

export interface LedgerPort {
  appendSuccess(record: SuccessRecord): Promise<void>;

  appendFailure(record: FailureRecord): Promise<void>;

  /**
   * Number of records in the success ledger (0 when it does not exist)
   */
  countSuccesses(): Promise<number>;

  countFailures(): Promise<number>;
}
