import { CycleRunner } from '@/application/services/controlLoop/modules';
import { LoggerMock } from '@mocks/infrastructure/logging/logger.mock';
import { LedgerMock } from '@mocks/infrastructure/ledger/ledger.mock';
import { AgentInvokerMock } from '@mocks/infrastructure/agents/agent-invoker.mock';
import { ClockMock } from '@mocks/domain/clock.mock';

describe('CycleRunner', () => {
  let logger: LoggerMock;
  let ledger: LedgerMock;
  let agent: AgentInvokerMock;
  let clock: ClockMock;
  let runner: CycleRunner;

  beforeEach(() => {
    logger = new LoggerMock();
    ledger = new LedgerMock();
    agent = new AgentInvokerMock();
    clock = new ClockMock(new Date(2026, 9, 19, 12, 0, 0));
    runner = new CycleRunner(agent, ledger, logger, '/work/prompt.md', clock);
  });

  it('records a success with the elapsed whole seconds', async () => {
    agent.pushScript({ exitCode: 0, during: () => clock.advance(42.7) });

    const outcome = await runner.runCycle(1);

    expect(outcome).toEqual({ status: 'SUCCESS', cycle: 1, durationSeconds: 42 });
    expect(ledger.successes).toEqual([
      { timestamp: '2026-10-19 12:00:42', cycle: 1, status: 'SUCCESS', duration_seconds: 42 },
    ]);
    expect(ledger.failures).toEqual([]);
    expect(logger.messages('success')).toEqual(['Cycle 1 completed in 42s']);
  });

  it('records a non-zero exit as a failure with its exit code', async () => {
    agent.pushScript({ exitCode: 1, during: () => clock.advance(5) });

    const outcome = await runner.runCycle(3);

    expect(outcome.status).toBe('FAILED');
    expect(ledger.failures).toEqual([{ timestamp: '2026-10-19 12:00:05', cycle: 3, status: 'FAILED', exit_code: 1 }]);
    expect(ledger.successes).toEqual([]);
    expect(logger.messages('error')).toEqual(['Cycle 3 failed (exit code 1)']);
  });

  it('records an agent that could not be executed as a failure', async () => {
    agent.pushScript({ error: new Error('Claude CLI process error: spawn claude ENOENT') });

    const outcome = await runner.runCycle(2);

    expect(outcome).toEqual({
      status: 'FAILED',
      cycle: 2,
      durationSeconds: 0,
      error: 'Claude CLI process error: spawn claude ENOENT',
    });
    expect(ledger.failures).toEqual([
      {
        timestamp: '2026-10-19 12:00:00',
        cycle: 2,
        status: 'FAILED',
        error: 'Claude CLI process error: spawn claude ENOENT',
      },
    ]);
  });

  it('passes the prompt file and streams output to the log', async () => {
    agent.pushScript({ exitCode: 0, output: ['Planning\n', 'Writing docs\n'] });

    await runner.runCycle(1);

    expect(agent.getCallHistory()).toEqual(['/work/prompt.md']);
    expect(logger.raw).toEqual(['Planning\n', 'Writing docs\n']);
    expect(logger.messages('info')).toEqual([
      'Starting development cycle 1...',
      'Invoking agent with prompt file /work/prompt.md',
    ]);
  });

  it('propagates ledger write failures', async () => {
    jest.spyOn(ledger, 'appendSuccess').mockRejectedValue(new Error('disk full'));

    await expect(runner.runCycle(1)).rejects.toThrow('disk full');
  });
});
