// Port: Version Control
// The subset of repository operations the loop needs

export interface VersionControlPort {
  isInitialized(): Promise<boolean>;

  init(): Promise<void>;

  stageAll(): Promise<void>;

  commit(message: string): Promise<void>;

  /**
   * True when staged, unstaged or untracked changes exist
   */
  hasUncommittedChanges(): Promise<boolean>;
}
