// Port: Logger
// Leveled, timestamped messages to console and the combined log

import { LogLevel } from '../types/types';

export interface LoggerPort {
  log(level: LogLevel, message: string): void;

  /**
   * Append raw agent output to the combined log, without a prefix
   */
  writeRaw(chunk: string): void;

  logStateTransition(from: string, to: string, context?: Record<string, unknown>): void;
}
