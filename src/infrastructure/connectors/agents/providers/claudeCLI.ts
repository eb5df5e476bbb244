// Claude CLI Dispatcher
// Runs the agent non-interactively against a prompt file and streams its output

import { spawn } from 'child_process';
import { Readable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { AgentInvocationResult } from '../../../../domain/types/types';
import { OutputListener } from '../../../../domain/ports/agentInvoker';

export const DEFAULT_CLAUDE_COMMAND = 'claude';

export interface ClaudeDispatchOptions {
  command?: string;
  cwd: string;
  onOutput: OutputListener;
}

/**
 * Decodes a byte stream into text chunks. A multi-byte character split
 * across reads is held back until it is complete.
 * Returns a flush function for whatever is left at exit.
 */
function forwardDecoded(stream: Readable | null, onOutput: OutputListener): () => void {
  if (!stream) {
    return () => undefined;
  }

  const decoder = new StringDecoder('utf8');
  stream.on('data', (data: Buffer) => {
    const text = decoder.write(data);
    if (text) onOutput(text);
  });

  return () => {
    const rest = decoder.end();
    if (rest) onOutput(rest);
  };
}

export function buildClaudeArgs(promptPath: string): string[] {
  return ['--dangerously-skip-permissions', '-p', promptPath];
}

/**
 * No timeout: the agent runs until it exits or the process is signalled.
 * A process killed by a signal reports exit code 1.
 */
export function dispatchToClaude(
  promptPath: string,
  options: ClaudeDispatchOptions
): Promise<AgentInvocationResult> {
  const command = options.command || DEFAULT_CLAUDE_COMMAND;
  const args = buildClaudeArgs(promptPath);

  return new Promise<AgentInvocationResult>((resolve, reject) => {
    const childProcess = spawn(command, args, {
      cwd: options.cwd,
      env: process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    childProcess.stdin?.end();

    const flushStdout = forwardDecoded(childProcess.stdout, options.onOutput);
    const flushStderr = forwardDecoded(childProcess.stderr, options.onOutput);

    childProcess.on('close', (code: number | null) => {
      flushStdout();
      flushStderr();
      resolve({ exitCode: code ?? 1 });
    });

    childProcess.on('error', (error: Error) => {
      reject(new Error(`Claude CLI process error: ${error.message}`));
    });
  });
}
