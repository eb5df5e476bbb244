// Configuration loader for the development loop
// Defaults, overridden by command-line flags; collaborator executables from the environment
import dotenv from 'dotenv';
import * as path from 'path';
import { LoopConfig } from '../domain/types/types';

// Load .env file if it exists
dotenv.config();

export const DEFAULTS = {
  promptFile: './prompt.md',
  delaySeconds: 10,
  maxLoops: 50,
  logFile: './dev_loop.log',
  docsDir: './docs',
  docsExtension: '.md',
  agentCommand: 'claude',
  gitCommand: 'git',
} as const;

export interface LoopConfigOverrides {
  promptFile?: string;
  delaySeconds?: number;
  maxLoops?: number;
  logFile?: string;
  docsDir?: string;
}

const POSITIVE_INTEGER = /^[0-9]+$/;

/**
 * Returns the value as a number when it is a positive integer written in
 * plain digits, otherwise null. "0", "-5", "1.5" and "abc" are all rejected.
 */
export function parsePositiveInteger(value: string): number | null {
  if (!POSITIVE_INTEGER.test(value)) {
    return null;
  }
  const parsed = parseInt(value, 10);
  return parsed >= 1 ? parsed : null;
}

export function loadLoopConfig(
  overrides: LoopConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): LoopConfig {
  for (const key of ['delaySeconds', 'maxLoops'] as const) {
    const value = overrides[key];
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      throw new Error(`${key} must be a positive integer, got ${value}`);
    }
  }

  const logFile = path.resolve(cwd, overrides.logFile ?? DEFAULTS.logFile);

  const config: LoopConfig = {
    workingDirectory: cwd,
    promptFile: path.resolve(cwd, overrides.promptFile ?? DEFAULTS.promptFile),
    delaySeconds: overrides.delaySeconds ?? DEFAULTS.delaySeconds,
    maxLoops: overrides.maxLoops ?? DEFAULTS.maxLoops,
    logFile,
    successLedgerFile: `${logFile}.success`,
    errorLedgerFile: `${logFile}.error`,
    docsDir: path.resolve(cwd, overrides.docsDir ?? DEFAULTS.docsDir),
    docsExtension: DEFAULTS.docsExtension,
    agentCommand: env.CLAUDE_CLI_PATH || DEFAULTS.agentCommand,
    gitCommand: env.GIT_PATH || DEFAULTS.gitCommand,
  };

  return Object.freeze(config);
}
