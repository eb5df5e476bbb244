import { VersionControlPort } from '../../../../domain/ports/versionControl';
import { LoggerPort } from '../../../../domain/ports/logger';
import { Clock, formatTimestamp, systemClock } from '../../../../domain/clock';
import { RepositoryInitializationError, errorMessage } from '../../../../domain/errors';

export class RepositoryInitializer {
  constructor(
    private vcs: VersionControlPort,
    private logger: LoggerPort,
    private clock: Clock = systemClock
  ) {}

  /**
   * Creates the repository with an initial snapshot commit on first run.
   * Later calls are no-ops. Resolves true when it initialized the repository.
   */
  async ensureInitialized(): Promise<boolean> {
    if (await this.vcs.isInitialized()) {
      this.logger.log('info', 'Git repository already exists, skipping initialization');
      return false;
    }

    this.logger.log('info', 'No git repository detected, initializing...');
    const message = `Auto-commit: ${formatTimestamp(this.clock.now())} [Initial]`;

    try {
      await this.vcs.init();
      await this.vcs.stageAll();
      await this.vcs.commit(message);
    } catch (error) {
      throw new RepositoryInitializationError(`Git initialization failed: ${errorMessage(error)}`);
    }

    this.logger.log('success', 'Git repository initialized with initial commit');
    return true;
  }
}
