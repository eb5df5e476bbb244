import { LoggerPort } from '../../../../domain/ports/logger';
import { LoopConfig } from '../../../../domain/types/types';
import {
  CycleCommitter,
  CycleRunner,
  RepositoryInitializer,
  ShutdownHandler,
  StatisticsReporter,
} from '../modules';

export type ExitFunction = (code: number) => void;

export interface LoopControllerDependencies {
  config: LoopConfig;
  logger: LoggerPort;
  initializer: RepositoryInitializer;
  runner: CycleRunner;
  committer: CycleCommitter;
  reporter: StatisticsReporter;
  shutdown: ShutdownHandler;
  /**
   * Called once the statistics are reported after an interrupt
   */
  exit: ExitFunction;
}
