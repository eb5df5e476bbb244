// Command Executor - Run external programs without a shell
// Non-zero exits resolve with their exit code; only spawn failures reject

import { execFile } from 'child_process';

export interface CommandResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[], cwd: string) => Promise<CommandResult>;

const MAX_BUFFER = 10 * 1024 * 1024; // 10MB

function numericExitCode(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}

function asText(output: string | Buffer): string {
  return typeof output === 'string' ? output : output.toString('utf8');
}

export function runCommand(file: string, args: string[], cwd: string): Promise<CommandResult> {
  const command = [file, ...args].join(' ');

  return new Promise<CommandResult>((resolve, reject) => {
    execFile(file, args, { cwd, maxBuffer: MAX_BUFFER, env: process.env }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ command, exitCode: 0, stdout: asText(stdout), stderr: asText(stderr) });
        return;
      }

      const exitCode = numericExitCode(error);
      if (exitCode === null) {
        // ENOENT, EACCES and friends: the program never ran
        reject(new Error(`Failed to execute ${file}: ${error.message}`));
        return;
      }

      resolve({ command, exitCode, stdout: asText(stdout), stderr: asText(stderr) });
    });
  });
}

/**
 * Whether a program can be found on PATH (or at the given path)
 */
export async function commandExists(command: string, runner: CommandRunner = runCommand): Promise<boolean> {
  const locator = process.platform === 'win32' ? 'where' : 'which';
  try {
    const result = await runner(locator, [command], process.cwd());
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
