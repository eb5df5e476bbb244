import { AgentInvokerPort, OutputListener } from '../../../../domain/ports/agentInvoker';
import { AgentInvocationResult } from '../../../../domain/types/types';
import { dispatchToClaude } from '../../../connectors/agents/providers/claudeCLI';

export class ClaudeAgentAdapter implements AgentInvokerPort {
  constructor(
    private readonly command: string,
    private readonly cwd: string
  ) {}

  async invoke(promptPath: string, onOutput: OutputListener): Promise<AgentInvocationResult> {
    return dispatchToClaude(promptPath, {
      command: this.command,
      cwd: this.cwd,
      onOutput,
    });
  }
}
