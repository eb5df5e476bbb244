export { RepositoryInitializer } from './repositoryInitializer';
export { CycleCommitter } from './cycleCommitter';
export { CycleRunner } from './cycleRunner';
export { StatisticsReporter } from './statisticsReporter';
export type { StatisticsSources } from './statisticsReporter';
export { ShutdownHandler } from './shutdownHandler';
export type { SignalSource, SleepResult } from './shutdownHandler';
