// Port: Environment
// Filesystem and PATH probes used by prerequisite checks and statistics

export interface EnvironmentPort {
  fileExists(filePath: string): Promise<boolean>;

  directoryExists(dirPath: string): Promise<boolean>;

  createDirectory(dirPath: string): Promise<void>;

  commandExists(command: string): Promise<boolean>;

  /**
   * Recursively count files ending in extension under dirPath.
   * Returns null when dirPath is not a directory.
   */
  countFiles(dirPath: string, extension: string): Promise<number | null>;

  removeFile(filePath: string): Promise<void>;
}
