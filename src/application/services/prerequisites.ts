import { EnvironmentPort } from '../../domain/ports/environment';
import { LoggerPort } from '../../domain/ports/logger';
import { LoopConfig } from '../../domain/types/types';
import { PrerequisiteError } from '../../domain/errors';

export type PrerequisiteSettings = Pick<LoopConfig, 'promptFile' | 'docsDir' | 'agentCommand' | 'gitCommand'>;

/**
 * Fails fast before any cycle runs. The documentation directory is the only
 * thing created here.
 */
export async function checkPrerequisites(
  settings: PrerequisiteSettings,
  environment: EnvironmentPort,
  logger: LoggerPort
): Promise<void> {
  logger.log('info', 'Checking environment...');

  if (!(await environment.fileExists(settings.promptFile))) {
    throw new PrerequisiteError(`Prompt file ${settings.promptFile} does not exist`);
  }

  if (!(await environment.directoryExists(settings.docsDir))) {
    logger.log('warn', `Directory ${settings.docsDir} does not exist, creating it...`);
    await environment.createDirectory(settings.docsDir);
  }

  if (!(await environment.commandExists(settings.agentCommand))) {
    throw new PrerequisiteError(
      `Agent command '${settings.agentCommand}' is not available; install it or set CLAUDE_CLI_PATH`
    );
  }

  if (!(await environment.commandExists(settings.gitCommand))) {
    throw new PrerequisiteError(`Git command '${settings.gitCommand}' is not available; install git or set GIT_PATH`);
  }

  logger.log('success', 'Environment check complete');
}
