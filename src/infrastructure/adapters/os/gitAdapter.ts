import * as path from 'path';
import { VersionControlPort } from '../../../domain/ports/versionControl';
import { GitCommandError } from '../../../domain/errors';
import { CommandRunner, runCommand } from '../../connectors/os/executors/commandExecutor';
import { directoryExists } from '../../connectors/os/executors/fileSystem';

export class GitAdapter implements VersionControlPort {
  constructor(
    private readonly cwd: string,
    private readonly gitCommand: string = 'git',
    private readonly runner: CommandRunner = runCommand
  ) {}

  async isInitialized(): Promise<boolean> {
    return directoryExists(path.join(this.cwd, '.git'));
  }

  async init(): Promise<void> {
    await this.git(['init', '-q']);
  }

  async stageAll(): Promise<void> {
    await this.git(['add', '.']);
  }

  async commit(message: string): Promise<void> {
    await this.git(['commit', '-q', '-m', message]);
  }

  async hasUncommittedChanges(): Promise<boolean> {
    // Porcelain output lists staged, unstaged and untracked paths, one per line
    const stdout = await this.git(['status', '--porcelain']);
    return stdout.trim().length > 0;
  }

  private async git(args: string[]): Promise<string> {
    const result = await this.runner(this.gitCommand, args, this.cwd);
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result.exitCode, result.stderr.trim());
    }
    return result.stdout;
  }
}
