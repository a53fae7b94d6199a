import type { ZodIssue } from 'zod';

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
  }

  static fromZodIssues(source: string, issues: ZodIssue[]): ConfigError {
    const lines = issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new ConfigError(`Invalid configuration in ${source}`, lines);
  }
}

/** Bad CLI arguments, a missing prompt file, or a mode refused on this branch. */
export class LoopUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LoopUsageError';
  }
}

export type GitSyncStage = 'sync' | 'push';

export class GitSyncError extends Error {
  constructor(
    message: string,
    readonly branch: string,
    readonly stage: GitSyncStage
  ) {
    super(message);
    this.name = 'GitSyncError';
  }
}
