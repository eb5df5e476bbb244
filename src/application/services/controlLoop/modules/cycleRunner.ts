import { AgentInvokerPort } from '../../../../domain/ports/agentInvoker';
import { LedgerPort } from '../../../../domain/ports/ledger';
import { LoggerPort } from '../../../../domain/ports/logger';
import { CycleOutcome } from '../../../../domain/types/types';
import { Clock, elapsedSeconds, formatTimestamp, systemClock } from '../../../../domain/clock';
import { errorMessage } from '../../../../domain/errors';
import {
  AgentRun,
  classifyOutcome,
  describeFailure,
  toLedgerRecord,
} from '../../../../domain/executors/cycleOutcome';

export class CycleRunner {
  constructor(
    private agent: AgentInvokerPort,
    private ledger: LedgerPort,
    private logger: LoggerPort,
    private promptFile: string,
    private clock: Clock = systemClock
  ) {}

  /**
   * Runs the agent once and records exactly one ledger entry.
   * Agent failures are recorded, not thrown; ledger write failures propagate.
   */
  async runCycle(cycle: number): Promise<CycleOutcome> {
    this.logger.log('info', `Starting development cycle ${cycle}...`);
    this.logger.log('info', `Invoking agent with prompt file ${this.promptFile}`);

    const startedAt = this.clock.now();
    let run: AgentRun;
    try {
      const result = await this.agent.invoke(this.promptFile, (chunk) => this.logger.writeRaw(chunk));
      run = { kind: 'exited', result };
    } catch (error) {
      run = { kind: 'failed', error: errorMessage(error) };
    }
    const finishedAt = this.clock.now();

    const outcome = classifyOutcome(cycle, elapsedSeconds(startedAt, finishedAt), run);
    const record = toLedgerRecord(outcome, formatTimestamp(finishedAt));

    if (record.status === 'SUCCESS') {
      await this.ledger.appendSuccess(record);
      this.logger.log('success', `Cycle ${cycle} completed in ${outcome.durationSeconds}s`);
    } else {
      await this.ledger.appendFailure(record);
      this.logger.log('error', `Cycle ${cycle} failed (${describeFailure(outcome)})`);
    }

    return outcome;
  }
}
