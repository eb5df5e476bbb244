// devloop - Main Entry Point
// Exports all public APIs

// Loop Controller
export { LoopController } from './src/application/services/controlLoop';
export type { LoopControllerDependencies, ExitFunction } from './src/application/services/controlLoop/types';
export {
  RepositoryInitializer,
  CycleCommitter,
  CycleRunner,
  StatisticsReporter,
  ShutdownHandler,
} from './src/application/services/controlLoop/modules';
export type { SignalSource, SleepResult, StatisticsSources } from './src/application/services/controlLoop/modules';

// Services
export { checkPrerequisites } from './src/application/services/prerequisites';
export { cleanLogs } from './src/application/services/logCleaner';

// Configuration
export { loadLoopConfig, parsePositiveInteger, DEFAULTS } from './src/config/loopConfig';
export type { LoopConfigOverrides } from './src/config/loopConfig';

// Ports
export type { LoggerPort } from './src/domain/ports/logger';
export type { AgentInvokerPort, OutputListener } from './src/domain/ports/agentInvoker';
export type { VersionControlPort } from './src/domain/ports/versionControl';
export type { LedgerPort } from './src/domain/ports/ledger';
export type { EnvironmentPort } from './src/domain/ports/environment';

// Adapters
export { LoggerAdapter } from './src/infrastructure/adapters/logging/loggerAdapter';
export { LedgerLogger } from './src/infrastructure/adapters/logging/ledgerLogger';
export { GitAdapter } from './src/infrastructure/adapters/os/gitAdapter';
export { EnvironmentAdapter } from './src/infrastructure/adapters/os/environmentAdapter';
export { ClaudeAgentAdapter } from './src/infrastructure/adapters/agents/providers/claudeAdapter';

// Errors
export { PrerequisiteError, RepositoryInitializationError, GitCommandError } from './src/domain/errors';

// CLI
export { createProgram, main } from './src/cli';

// Types
export type {
  LoopConfig,
  LoopState,
  LogLevel,
  CycleOutcome,
  CycleStatistics,
  LoopSummary,
  SuccessRecord,
  FailureRecord,
  LedgerRecord,
  CommitResult,
} from './src/domain/types/types';
