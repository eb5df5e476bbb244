import { LedgerPort } from '../../../../domain/ports/ledger';
import { LoggerPort } from '../../../../domain/ports/logger';
import { EnvironmentPort } from '../../../../domain/ports/environment';
import { CycleStatistics } from '../../../../domain/types/types';
import { errorMessage } from '../../../../domain/errors';

export interface StatisticsSources {
  docsDir: string;
  docsExtension: string;
}

export class StatisticsReporter {
  constructor(
    private ledger: LedgerPort,
    private environment: EnvironmentPort,
    private logger: LoggerPort,
    private sources: StatisticsSources
  ) {}

  /**
   * Read-only. Never throws: anything unreadable counts as zero.
   */
  async report(): Promise<CycleStatistics> {
    this.logger.log('info', '=== Development loop statistics ===');

    const successCount = await this.readCount('success ledger', () => this.ledger.countSuccesses());
    const errorCount = await this.readCount('error ledger', () => this.ledger.countFailures());
    const totalCycles = successCount + errorCount;

    this.logger.log('info', `Successful cycles: ${successCount}`);
    this.logger.log('info', `Failed cycles: ${errorCount}`);
    this.logger.log('info', `Total cycles: ${totalCycles}`);

    let docCount: number | null = null;
    try {
      docCount = await this.environment.countFiles(this.sources.docsDir, this.sources.docsExtension);
    } catch (error) {
      this.logger.log('warn', `Could not scan ${this.sources.docsDir}: ${errorMessage(error)}`);
    }
    if (docCount !== null) {
      this.logger.log('info', `Documentation files: ${docCount}`);
    }

    return { successCount, errorCount, totalCycles, docCount };
  }

  private async readCount(name: string, read: () => Promise<number>): Promise<number> {
    try {
      return await read();
    } catch (error) {
      this.logger.log('warn', `Could not read ${name}: ${errorMessage(error)}`);
      return 0;
    }
  }
}
