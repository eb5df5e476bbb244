// Type definitions for the development loop and its records

export type LogLevel = 'info' | 'success' | 'warn' | 'error';

export type LoopState =
  | 'IDLE'
  | 'INITIALIZING'
  | 'RUNNING'
  | 'COMMITTING'
  | 'DELAYING'
  | 'INTERRUPTED'
  | 'COMPLETED';

export type StopReason = 'completed' | 'interrupted';

/**
 * Immutable run configuration, built once at startup.
 * All paths are absolute.
 */
export interface LoopConfig {
  readonly workingDirectory: string;
  readonly promptFile: string;
  readonly delaySeconds: number;
  readonly maxLoops: number;
  readonly logFile: string;
  readonly successLedgerFile: string;
  readonly errorLedgerFile: string;
  readonly docsDir: string;
  readonly docsExtension: string;
  readonly agentCommand: string;
  readonly gitCommand: string;
}

// Ledger records are written one JSON object per line
export interface SuccessRecord {
  timestamp: string; // YYYY-MM-DD HH:MM:SS, local time
  cycle: number;
  status: 'SUCCESS';
  duration_seconds: number;
}

export interface FailureRecord {
  timestamp: string;
  cycle: number;
  status: 'FAILED';
  exit_code?: number;
  error?: string; // Set when the agent could not be executed at all
}

export type LedgerRecord = SuccessRecord | FailureRecord;

export type CycleOutcome =
  | {
      status: 'SUCCESS';
      cycle: number;
      durationSeconds: number;
    }
  | {
      status: 'FAILED';
      cycle: number;
      durationSeconds: number;
      exitCode?: number;
      error?: string;
    };

export interface AgentInvocationResult {
  exitCode: number;
}

export interface CommitResult {
  committed: boolean;
  message?: string;
  error?: string;
}

export interface CycleStatistics {
  successCount: number;
  errorCount: number;
  totalCycles: number;
  docCount: number | null; // null when the documentation directory is absent
}

export interface LoopSummary {
  reason: StopReason;
  cyclesExecuted: number;
  statistics: CycleStatistics;
}
