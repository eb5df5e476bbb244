import * as path from 'path';
import { LoopConfig } from '@/domain/types/types';

/**
 * Fluent builder for LoopConfig in tests
 */
export class LoopConfigBuilder {
  private config: LoopConfig;

  constructor(root: string = '/tmp/devloop-test') {
    const logFile = path.join(root, 'dev_loop.log');
    this.config = {
      workingDirectory: root,
      promptFile: path.join(root, 'prompt.md'),
      delaySeconds: 1,
      maxLoops: 3,
      logFile,
      successLedgerFile: `${logFile}.success`,
      errorLedgerFile: `${logFile}.error`,
      docsDir: path.join(root, 'docs'),
      docsExtension: '.md',
      agentCommand: 'claude',
      gitCommand: 'git',
    };
  }

  static create(root?: string): LoopConfigBuilder {
    return new LoopConfigBuilder(root);
  }

  withMaxLoops(maxLoops: number): this {
    this.config = { ...this.config, maxLoops };
    return this;
  }

  withDelay(delaySeconds: number): this {
    this.config = { ...this.config, delaySeconds };
    return this;
  }

  withAgentCommand(agentCommand: string): this {
    this.config = { ...this.config, agentCommand };
    return this;
  }

  build(): LoopConfig {
    return { ...this.config };
  }
}
