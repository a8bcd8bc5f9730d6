//typed failures of the router, each keeps its prototype chain for instanceof checks
import type { ZodError } from 'zod';

//a candidate fact or bootstrap record failed schema validation
export class ValidationError extends Error {
  public readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`ValidationError: ${subject} failed validation: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static fromZod(subject: string, error: ZodError): ValidationError {
    return new ValidationError(subject, formatZodIssues(error));
  }
}

//no category set is known for an asset type; callers fall back to the default set
export class UnknownAssetTypeError extends Error {
  constructor(public readonly assetType: string) {
    super(`No category set stored for asset type "${assetType}"`);
    this.name = 'UnknownAssetTypeError';
    Object.setPrototypeOf(this, UnknownAssetTypeError.prototype);
  }
}

export class SimilarityTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Similarity lookup exceeded ${timeoutMs}ms`);
    this.name = 'SimilarityTimeoutError';
    Object.setPrototypeOf(this, SimilarityTimeoutError.prototype);
  }
}

//persistence failed for a single request
export class StorageUnavailableError extends Error {
  constructor(public readonly operation: string, cause: unknown) {
    super(`Storage unavailable during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'StorageUnavailableError';
    Object.setPrototypeOf(this, StorageUnavailableError.prototype);
  }
}

export class ClassificationCancelledError extends Error {
  constructor(filename: string) {
    super(`Classification of ${filename} was cancelled before commit`);
    this.name = 'ClassificationCancelledError';
    Object.setPrototypeOf(this, ClassificationCancelledError.prototype);
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export class ConflictStateError extends Error {
  constructor(conflictId: string, reason: string) {
    super(`Conflict ${conflictId} cannot be resolved: ${reason}`);
    this.name = 'ConflictStateError';
    Object.setPrototypeOf(this, ConflictStateError.prototype);
  }
}

export class ReviewStateError extends Error {
  constructor(reviewId: string, reason: string) {
    super(`Review item ${reviewId} cannot be resolved: ${reason}`);
    this.name = 'ReviewStateError';
    Object.setPrototypeOf(this, ReviewStateError.prototype);
  }
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(i => `[${i.path.join('.') || '(root)'}] ${i.message}`);
}

//better-sqlite3 raises SqliteError, and TypeError once the connection is closed
export function isStorageFailure(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.name === 'SqliteError' || (err instanceof TypeError && /database connection/i.test(err.message));
}
