import { EnvironmentPort } from '../../domain/ports/environment';
import { LoggerPort } from '../../domain/ports/logger';
import { LoopConfig } from '../../domain/types/types';

export type LogFiles = Pick<LoopConfig, 'logFile' | 'successLedgerFile' | 'errorLedgerFile'>;

/**
 * Removes the combined log and both ledgers. Missing files are ignored.
 * The closing message is logged after removal, so it starts a fresh log.
 */
export async function cleanLogs(files: LogFiles, environment: EnvironmentPort, logger: LoggerPort): Promise<void> {
  logger.log('info', 'Cleaning log files...');

  for (const file of [files.logFile, files.successLedgerFile, files.errorLedgerFile]) {
    await environment.removeFile(file);
  }

  logger.log('success', 'Log files cleaned');
}
