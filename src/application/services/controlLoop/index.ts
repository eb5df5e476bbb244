// Development Loop Controller
// IDLE → INITIALIZING → (RUNNING → COMMITTING → DELAYING)* → COMPLETED,
// with RUNNING | COMMITTING | DELAYING → INTERRUPTED → COMPLETED on a signal.
import { CycleStatistics, LoopState, LoopSummary, StopReason } from '../../../domain/types/types';
import { errorMessage } from '../../../domain/errors';
import { LoopControllerDependencies } from './types';

const SEPARATOR = '==========================================';

export class LoopController {
  private state: LoopState = 'IDLE';
  private cyclesExecuted = 0;
  private finalizing: Promise<CycleStatistics> | null = null;

  constructor(private deps: LoopControllerDependencies) {}

  get currentState(): LoopState {
    return this.state;
  }

  async run(): Promise<LoopSummary> {
    const { config, logger, shutdown } = this.deps;

    logger.log('info', 'Starting development loop...');
    logger.log('info', `Configuration: max cycles=${config.maxLoops}, delay=${config.delaySeconds}s`);
    logger.log('info', `Log file: ${config.logFile}`);

    shutdown.install((signal) => this.onShutdownSignal(signal));
    try {
      this.transition('INITIALIZING');
      await this.deps.initializer.ensureInitialized();

      await this.runCycles();

      if (shutdown.isRequested) {
        return this.summary('interrupted', await this.finalize('interrupted'));
      }

      logger.log('info', SEPARATOR);
      logger.log('success', `All ${config.maxLoops} development cycles completed`);
      return this.summary('completed', await this.finalize('completed'));
    } finally {
      shutdown.uninstall();
    }
  }

  private async runCycles(): Promise<void> {
    const { config, logger, shutdown } = this.deps;

    for (let cycle = 1; cycle <= config.maxLoops; cycle++) {
      if (shutdown.isRequested) return;

      logger.log('info', SEPARATOR);
      logger.log('info', `Starting cycle ${cycle}/${config.maxLoops}`);

      this.transition('RUNNING', { cycle });
      await this.deps.runner.runCycle(cycle);
      this.cyclesExecuted = cycle;
      if (shutdown.isRequested) return;

      // Commit even after a failed cycle: the agent may have left changes behind
      this.transition('COMMITTING', { cycle });
      await this.deps.committer.commitIfChanged();
      if (shutdown.isRequested) return;

      if (cycle < config.maxLoops) {
        this.transition('DELAYING', { cycle });
        logger.log('info', `Waiting ${config.delaySeconds}s before the next cycle...`);
        const slept = await shutdown.sleep(config.delaySeconds * 1000);
        if (slept === 'interrupted') return;
      }
    }
  }

  /**
   * Both terminal paths end here. Statistics are reported once, however
   * many times this is called.
   */
  finalize(reason: StopReason): Promise<CycleStatistics> {
    if (!this.finalizing) {
      this.finalizing = this.reportAndComplete(reason);
    }
    return this.finalizing;
  }

  private async reportAndComplete(reason: StopReason): Promise<CycleStatistics> {
    const statistics = await this.deps.reporter.report();
    this.transition('COMPLETED', { reason, cycles_executed: this.cyclesExecuted });
    if (reason === 'interrupted') {
      this.deps.logger.log('warn', 'Development loop stopped');
    }
    return statistics;
  }

  private onShutdownSignal(signal: NodeJS.Signals): void {
    const { logger } = this.deps;
    logger.log('warn', `Received ${signal}, shutting down...`);
    this.transition('INTERRUPTED', { signal });

    this.finalize('interrupted').then(
      () => this.deps.exit(0),
      (error: unknown) => {
        logger.log('error', `Shutdown failed: ${errorMessage(error)}`);
        this.deps.exit(1);
      }
    );
  }

  private transition(to: LoopState, context?: Record<string, unknown>): void {
    const from = this.state;
    this.state = to;
    this.deps.logger.logStateTransition(from, to, context);
  }

  private summary(reason: StopReason, statistics: CycleStatistics): LoopSummary {
    return { reason, cyclesExecuted: this.cyclesExecuted, statistics };
  }
}
