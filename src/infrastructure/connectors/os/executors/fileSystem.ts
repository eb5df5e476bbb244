import * as fs from 'fs/promises';
import { glob } from 'glob';

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export async function createDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Count newline-terminated lines, like `wc -l`. A missing file has zero.
 */
export async function countLines(filePath: string): Promise<number> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return 0;
    }
    throw error;
  }

  let count = 0;
  for (const char of content) {
    if (char === '\n') count++;
  }
  return count;
}

/**
 * Recursively count files with the given extension (e.g. ".md").
 * Hidden files are included.
 */
export async function countFilesByExtension(dirPath: string, extension: string): Promise<number> {
  const matches = await glob(`**/*${extension}`, {
    cwd: dirPath,
    nodir: true,
    dot: true,
  });
  return matches.length;
}

export async function removeFile(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}
