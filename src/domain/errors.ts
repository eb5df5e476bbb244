// Fatal error types. Anything thrown with these stops the run before or
// during initialization; per-cycle failures never surface as exceptions.

export class PrerequisiteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PrerequisiteError';
  }
}

export class RepositoryInitializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RepositoryInitializationError';
  }
}

export class GitCommandError extends Error {
  constructor(
    public readonly args: string[],
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(`git ${args.join(' ')} failed with exit code ${exitCode}${stderr ? `: ${stderr}` : ''}`);
    this.name = 'GitCommandError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
