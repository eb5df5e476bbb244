import { StatisticsReporter } from '@/application/services/controlLoop/modules';
import { LoggerMock } from '@mocks/infrastructure/logging/logger.mock';
import { LedgerMock } from '@mocks/infrastructure/ledger/ledger.mock';
import { EnvironmentMock } from '@mocks/infrastructure/environment/environment.mock';

describe('StatisticsReporter', () => {
  const sources = { docsDir: '/work/docs', docsExtension: '.md' };
  let logger: LoggerMock;
  let ledger: LedgerMock;
  let environment: EnvironmentMock;
  let reporter: StatisticsReporter;

  beforeEach(() => {
    logger = new LoggerMock();
    ledger = new LedgerMock();
    environment = new EnvironmentMock();
    reporter = new StatisticsReporter(ledger, environment, logger, sources);
  });

  it('reports ledger counts and documentation files', async () => {
    await ledger.appendSuccess({ timestamp: '2026-10-19 10:00:00', cycle: 1, status: 'SUCCESS', duration_seconds: 3 });
    await ledger.appendFailure({ timestamp: '2026-10-19 10:05:00', cycle: 2, status: 'FAILED', exit_code: 1 });
    await ledger.appendSuccess({ timestamp: '2026-10-19 10:10:00', cycle: 3, status: 'SUCCESS', duration_seconds: 4 });
    environment.addDirectory('/work/docs', 7);

    const statistics = await reporter.report();

    expect(statistics).toEqual({ successCount: 2, errorCount: 1, totalCycles: 3, docCount: 7 });
    expect(logger.messages('info')).toEqual([
      '=== Development loop statistics ===',
      'Successful cycles: 2',
      'Failed cycles: 1',
      'Total cycles: 3',
      'Documentation files: 7',
    ]);
  });

  it('reports zeros and omits documentation when nothing exists yet', async () => {
    const statistics = await reporter.report();

    expect(statistics).toEqual({ successCount: 0, errorCount: 0, totalCycles: 0, docCount: null });
    expect(logger.messages('info')).not.toContain('Documentation files: 0');
  });

  it('never throws when sources are unreadable', async () => {
    ledger.countError = new Error('EACCES');
    environment.countError = new Error('EACCES');

    const statistics = await reporter.report();

    expect(statistics).toEqual({ successCount: 0, errorCount: 0, totalCycles: 0, docCount: null });
    expect(logger.messages('warn')).toEqual([
      'Could not read success ledger: EACCES',
      'Could not read error ledger: EACCES',
      'Could not scan /work/docs: EACCES',
    ]);
  });
});
