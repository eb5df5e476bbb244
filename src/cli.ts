#!/usr/bin/env node
// devloop CLI Entrypoint
// Runs the agent in bounded cycles and commits after each one

import { Command, InvalidArgumentError } from 'commander';
import { DEFAULTS, loadLoopConfig, parsePositiveInteger } from './config/loopConfig';
import { LoopConfig, LoopSummary, CycleStatistics } from './domain/types/types';
import { LoggerPort } from './domain/ports/logger';
import { errorMessage } from './domain/errors';
import { LoopController } from './application/services/controlLoop';
import { ExitFunction } from './application/services/controlLoop/types';
import {
  CycleCommitter,
  CycleRunner,
  RepositoryInitializer,
  ShutdownHandler,
  StatisticsReporter,
} from './application/services/controlLoop/modules';
import { checkPrerequisites } from './application/services/prerequisites';
import { cleanLogs } from './application/services/logCleaner';
import { LoggerAdapter } from './infrastructure/adapters/logging/loggerAdapter';
import { LedgerLogger } from './infrastructure/adapters/logging/ledgerLogger';
import { EnvironmentAdapter } from './infrastructure/adapters/os/environmentAdapter';
import { GitAdapter } from './infrastructure/adapters/os/gitAdapter';
import { ClaudeAgentAdapter } from './infrastructure/adapters/agents/providers/claudeAdapter';

export interface CliOptions {
  delay: number;
  loops: number;
  stats?: boolean;
  clean?: boolean;
  prompt: string;
  logFile: string;
  docsDir: string;
}

export interface CommandContext {
  config: LoopConfig;
  logger: LoggerPort;
  exit: ExitFunction;
}

export type CommandHandler = (context: CommandContext) => Promise<unknown>;

export interface CommandHandlers {
  start: CommandHandler;
  stats: CommandHandler;
  clean: CommandHandler;
}

export interface ProgramDependencies {
  handlers: CommandHandlers;
  exit: ExitFunction;
  createLogger: (config: LoopConfig) => LoggerPort;
}

const EXAMPLES = `
Examples:
  $ devloop                 run with the default configuration
  $ devloop -d 60 -l 10     60 second delay, at most 10 cycles
  $ devloop -s              show statistics
  $ devloop -c              remove log files

-s and -c act on whichever comes first; -d and -l are validated before either.`;

function positiveInteger(label: string): (value: string) => number {
  return (value: string): number => {
    const parsed = parsePositiveInteger(value);
    if (parsed === null) {
      throw new InvalidArgumentError(`${label} must be a positive integer.`);
    }
    return parsed;
  };
}

/**
 * Run the development loop
 * Checks prerequisites, then hands control to the loop controller
 */
async function start({ config, logger, exit }: CommandContext): Promise<LoopSummary> {
  logger.log('info', 'devloop started');
  logger.log('info', `Working directory: ${config.workingDirectory}`);

  const environment = new EnvironmentAdapter();
  await checkPrerequisites(config, environment, logger);

  const vcs = new GitAdapter(config.workingDirectory, config.gitCommand);
  const ledger = new LedgerLogger(config.successLedgerFile, config.errorLedgerFile);
  const agent = new ClaudeAgentAdapter(config.agentCommand, config.workingDirectory);

  const controller = new LoopController({
    config,
    logger,
    initializer: new RepositoryInitializer(vcs, logger),
    runner: new CycleRunner(agent, ledger, logger, config.promptFile),
    committer: new CycleCommitter(vcs, logger),
    reporter: new StatisticsReporter(ledger, environment, logger, config),
    shutdown: new ShutdownHandler(),
    exit,
  });

  return controller.run();
}

/**
 * Show statistics
 * Read-only view over the ledgers and documentation directory
 */
async function stats({ config, logger }: CommandContext): Promise<CycleStatistics> {
  const ledger = new LedgerLogger(config.successLedgerFile, config.errorLedgerFile);
  const reporter = new StatisticsReporter(ledger, new EnvironmentAdapter(), logger, config);
  return reporter.report();
}

async function clean({ config, logger }: CommandContext): Promise<void> {
  await cleanLogs(config, new EnvironmentAdapter(), logger);
}

const defaultDependencies: ProgramDependencies = {
  handlers: { start, stats, clean },
  exit: (code) => process.exit(code),
  createLogger: (config) => new LoggerAdapter(config.logFile),
};

export function createProgram(overrides: Partial<ProgramDependencies> = {}): Command {
  const deps: ProgramDependencies = { ...defaultDependencies, ...overrides };
  const program = new Command();
  let mode: 'stats' | 'clean' | null = null;

  // Parse errors go to the combined log of the run they belong to
  const logParseError = (message: string): void => {
    const logFile: unknown = program.getOptionValue('logFile');
    const config = loadLoopConfig({ logFile: typeof logFile === 'string' ? logFile : DEFAULTS.logFile });
    deps.createLogger(config).log('error', message.trim().replace(/^error: /, ''));
  };

  program
    .name('devloop')
    .description('Run a coding agent in bounded cycles, committing the working tree after each cycle')
    .option('-d, --delay <seconds>', 'delay between cycles in seconds', positiveInteger('Delay'), DEFAULTS.delaySeconds)
    .option('-l, --loops <count>', 'maximum number of cycles', positiveInteger('Loop count'), DEFAULTS.maxLoops)
    .option('-s, --stats', 'show statistics only')
    .option('-c, --clean', 'remove log and ledger files')
    .option('-p, --prompt <file>', 'prompt file passed to the agent', DEFAULTS.promptFile)
    .option('--log-file <file>', 'combined log file; ledgers sit beside it', DEFAULTS.logFile)
    .option('--docs-dir <dir>', 'documentation directory counted in statistics', DEFAULTS.docsDir)
    .allowExcessArguments(false)
    .showHelpAfterError()
    .addHelpText('after', EXAMPLES)
    .configureOutput({ outputError: (message) => logParseError(message) })
    .on('option:stats', () => {
      mode = mode ?? 'stats';
    })
    .on('option:clean', () => {
      mode = mode ?? 'clean';
    })
    .action(async (options: CliOptions) => {
      const config = loadLoopConfig({
        delaySeconds: options.delay,
        maxLoops: options.loops,
        promptFile: options.prompt,
        logFile: options.logFile,
        docsDir: options.docsDir,
      });
      const logger = deps.createLogger(config);

      const handler = mode ? deps.handlers[mode] : deps.handlers.start;

      try {
        await handler({ config, logger, exit: deps.exit });
      } catch (error) {
        logger.log('error', errorMessage(error));
        deps.exit(1);
      }
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('devloop failed:', errorMessage(error));
    process.exit(1);
  });
}

export { start, stats, clean };
