import { checkPrerequisites } from '@/application/services/prerequisites';
import { PrerequisiteError } from '@/domain/errors';
import { LoggerMock } from '@mocks/infrastructure/logging/logger.mock';
import { EnvironmentMock } from '@mocks/infrastructure/environment/environment.mock';

describe('checkPrerequisites', () => {
  const settings = {
    promptFile: '/work/prompt.md',
    docsDir: '/work/docs',
    agentCommand: 'claude',
    gitCommand: 'git',
  };
  let logger: LoggerMock;
  let environment: EnvironmentMock;

  beforeEach(() => {
    logger = new LoggerMock();
    environment = new EnvironmentMock().addFile('/work/prompt.md').addDirectory('/work/docs');
  });

  it('passes when everything is in place', async () => {
    await checkPrerequisites(settings, environment, logger);

    expect(environment.created).toEqual([]);
    expect(logger.messages()).toEqual(['Checking environment...', 'Environment check complete']);
  });

  it('fails when the prompt file is missing', async () => {
    environment.files.clear();

    const pending = checkPrerequisites(settings, environment, logger);

    await expect(pending).rejects.toBeInstanceOf(PrerequisiteError);
    await expect(pending).rejects.toThrow('Prompt file /work/prompt.md does not exist');
  });

  it('creates a missing documentation directory with a warning', async () => {
    environment.directories.clear();

    await checkPrerequisites(settings, environment, logger);

    expect(environment.created).toEqual(['/work/docs']);
    expect(logger.messages('warn')).toEqual(['Directory /work/docs does not exist, creating it...']);
  });

  it('fails when the agent is not installed', async () => {
    environment.commands.delete('claude');

    await expect(checkPrerequisites(settings, environment, logger)).rejects.toThrow(
      "Agent command 'claude' is not available; install it or set CLAUDE_CLI_PATH"
    );
  });

  it('fails when git is not installed', async () => {
    environment.commands.delete('git');

    await expect(checkPrerequisites(settings, environment, logger)).rejects.toThrow(
      "Git command 'git' is not available; install git or set GIT_PATH"
    );
  });
});
