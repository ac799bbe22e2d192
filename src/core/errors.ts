import type { ZodError } from 'zod';

export class RepoNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RepoNotFoundError';
  }
}

export class RemovalListError extends Error {
  constructor(
    readonly path: string,
    reason: string,
  ) {
    super(`Invalid removal list ${path}: ${reason}`);
    this.name = 'RemovalListError';
  }
}

/** The archive tree could not be created; nothing further may be moved. */
export class ArchiveDirectoryError extends Error {
  constructor(
    readonly directory: string,
    reason: string,
  ) {
    super(`Failed to create archive directory ${directory}: ${reason}`);
    this.name = 'ArchiveDirectoryError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
