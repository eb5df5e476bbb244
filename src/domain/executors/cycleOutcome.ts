// Cycle outcome classification
// Pure functions only - no side effects, no logging

import {
  AgentInvocationResult,
  CycleOutcome,
  FailureRecord,
  LedgerRecord,
  SuccessRecord,
} from '../types/types';

export type AgentRun =
  | { kind: 'exited'; result: AgentInvocationResult }
  | { kind: 'failed'; error: string };

/**
 * Exit status zero is the only success. A non-zero exit, or an agent that
 * could not be executed at all, is a failure.
 */
export function classifyOutcome(cycle: number, durationSeconds: number, run: AgentRun): CycleOutcome {
  if (run.kind === 'failed') {
    return { status: 'FAILED', cycle, durationSeconds, error: run.error };
  }

  if (run.result.exitCode === 0) {
    return { status: 'SUCCESS', cycle, durationSeconds };
  }

  return { status: 'FAILED', cycle, durationSeconds, exitCode: run.result.exitCode };
}

export function toLedgerRecord(outcome: CycleOutcome, timestamp: string): LedgerRecord {
  if (outcome.status === 'SUCCESS') {
    const record: SuccessRecord = {
      timestamp,
      cycle: outcome.cycle,
      status: 'SUCCESS',
      duration_seconds: outcome.durationSeconds,
    };
    return record;
  }

  const record: FailureRecord = {
    timestamp,
    cycle: outcome.cycle,
    status: 'FAILED',
  };
  if (outcome.exitCode !== undefined) {
    record.exit_code = outcome.exitCode;
  }
  if (outcome.error !== undefined) {
    record.error = outcome.error;
  }
  return record;
}

export function describeFailure(outcome: CycleOutcome): string {
  if (outcome.status === 'SUCCESS') {
    return '';
  }
  if (outcome.error !== undefined) {
    return outcome.error;
  }
  return `exit code ${outcome.exitCode ?? 'unknown'}`;
}
