import { EnvironmentPort } from '../../../domain/ports/environment';
import { commandExists } from '../../connectors/os/executors/commandExecutor';
import {
  countFilesByExtension,
  createDirectory,
  directoryExists,
  fileExists,
  removeFile,
} from '../../connectors/os/executors/fileSystem';

export class EnvironmentAdapter implements EnvironmentPort {
  async fileExists(filePath: string): Promise<boolean> {
    return fileExists(filePath);
  }

  async directoryExists(dirPath: string): Promise<boolean> {
    return directoryExists(dirPath);
  }

  async createDirectory(dirPath: string): Promise<void> {
    return createDirectory(dirPath);
  }

  async commandExists(command: string): Promise<boolean> {
    return commandExists(command);
  }

  async countFiles(dirPath: string, extension: string): Promise<number | null> {
    if (!(await directoryExists(dirPath))) {
      return null;
    }
    return countFilesByExtension(dirPath, extension);
  }

  async removeFile(filePath: string): Promise<void> {
    return removeFile(filePath);
  }
}
