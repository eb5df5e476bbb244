import { VersionControlPort } from '../../../../domain/ports/versionControl';
import { LoggerPort } from '../../../../domain/ports/logger';
import { CommitResult } from '../../../../domain/types/types';
import { Clock, formatTimestamp, systemClock } from '../../../../domain/clock';
import { errorMessage } from '../../../../domain/errors';

export class CycleCommitter {
  constructor(
    private vcs: VersionControlPort,
    private logger: LoggerPort,
    private clock: Clock = systemClock
  ) {}

  /**
   * Snapshot the working tree if anything changed since the last commit.
   * Failures are logged and reported in the result, never thrown: the
   * uncommitted changes are picked up by the next cycle's commit.
   */
  async commitIfChanged(): Promise<CommitResult> {
    try {
      if (!(await this.vcs.hasUncommittedChanges())) {
        this.logger.log('info', 'No file changes, skipping commit');
        return { committed: false };
      }

      const message = `Auto-commit: ${formatTimestamp(this.clock.now())}`;
      await this.vcs.stageAll();
      await this.vcs.commit(message);
      this.logger.log('success', `Auto-commit complete: ${message}`);
      return { committed: true, message };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.log('error', `Auto-commit failed: ${reason}`);
      return { committed: false, error: reason };
    }
  }
}
