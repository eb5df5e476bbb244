// Shared logging utilities for the development loop
// All modules log through LoggerAdapter, which delegates here

import * as fs from 'fs';
import * as path from 'path';
import { LogLevel } from '../../../domain/types/types';
import { formatTimestamp } from '../../../domain/clock';

export const colors = {
  reset: '\x1b[0m',
  red: '\x1b[0;31m',
  green: '\x1b[0;32m',
  yellow: '\x1b[1;33m',
  blue: '\x1b[0;34m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  info: colors.blue,
  success: colors.green,
  warn: colors.yellow,
  error: colors.red,
};

// Force stdout flush for non-TTY environments (pm2, nohup)
function flushStdout(): void {
  if (process.stdout.isTTY === false) {
    process.stdout.write('', () => {});
  }
}

function writeLine(line: string): void {
  process.stdout.write(line + '\n', () => {
    flushStdout();
  });
}

function writeErrorLine(line: string): void {
  process.stderr.write(line + '\n', () => {
    flushStdout();
  });
}

export function formatPrefix(level: LogLevel, date: Date): string {
  return `[${formatTimestamp(date)}] ${level.toUpperCase()}:`;
}

/**
 * Plain line as written to the combined log
 */
export function formatLogLine(level: LogLevel, message: string, date: Date): string {
  return `${formatPrefix(level, date)} ${message}`;
}

export function formatConsoleLine(level: LogLevel, message: string, date: Date): string {
  return `${LEVEL_COLORS[level]}${formatPrefix(level, date)}${colors.reset} ${message}`;
}

/**
 * Synchronous append: the line is on disk before this returns.
 * Write failures propagate to the caller.
 */
export function appendToLogFile(logFile: string, text: string): void {
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  fs.appendFileSync(logFile, text, 'utf8');
}

export function log(level: LogLevel, message: string, logFile?: string, date: Date = new Date()): void {
  if (logFile) {
    appendToLogFile(logFile, formatLogLine(level, message, date) + '\n');
  }

  const line = formatConsoleLine(level, message, date);
  if (level === 'error') {
    writeErrorLine(line);
  } else {
    writeLine(line);
  }
}

export function logStateTransition(
  from: string,
  to: string,
  context?: Record<string, unknown>,
  logFile?: string
): void {
  const contextStr = context ? ` | Context: ${JSON.stringify(context)}` : '';
  log('info', `STATE ${from} → ${to}${contextStr}`, logFile);
}

export function writeRaw(chunk: string, logFile?: string): void {
  if (logFile) {
    appendToLogFile(logFile, chunk);
  }
  process.stdout.write(chunk);
}
