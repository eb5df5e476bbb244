import { LoggerPort } from '../../../domain/ports/logger';
import { LogLevel } from '../../../domain/types/types';
import { log, logStateTransition, writeRaw } from './logger';

export class LoggerAdapter implements LoggerPort {
  constructor(private readonly logFile?: string) {}

  log(level: LogLevel, message: string): void {
    log(level, message, this.logFile);
  }

  writeRaw(chunk: string): void {
    writeRaw(chunk, this.logFile);
  }

  logStateTransition(from: string, to: string, context?: Record<string, unknown>): void {
    logStateTransition(from, to, context, this.logFile);
  }
}
