// Port: Agent Invoker
// Runs the external coding agent once against a prompt file

import { AgentInvocationResult } from '../types/types';

export type OutputListener = (chunk: string) => void;

export interface AgentInvokerPort {
  /**
   * Resolves with the exit status once the agent process has exited.
   * Combined stdout/stderr is delivered to onOutput as it is produced.
   * Rejects only when the process could not be executed.
   */
  invoke(promptPath: string, onOutput: OutputListener): Promise<AgentInvocationResult>;
}
