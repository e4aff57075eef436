import type { ZodError } from 'zod';

export type ExtractionErrorCode = 'EMPTY_INPUT' | 'SCHEMA_VIOLATION' | 'COLLABORATOR_UNAVAILABLE';

/**
 * Base class for every failure an extraction call can surface.
 * `code` discriminates the subclasses for callers that switch on it.
 */
export abstract class ExtractionError extends Error {
  abstract readonly code: ExtractionErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends ExtractionError {
  readonly code = 'EMPTY_INPUT';

  constructor(readonly schemaName: string) {
    super(`Cannot run ${schemaName} extraction on empty input`);
  }
}

export class SchemaViolationError extends ExtractionError {
  readonly code = 'SCHEMA_VIOLATION';

  constructor(
    readonly schemaName: string,
    readonly issues: string[],
    options?: { cause?: unknown }
  ) {
    super(`${schemaName} response violated its schema: ${issues.join('; ')}`, options);
  }

  static fromZodError(schemaName: string, error: ZodError): SchemaViolationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new SchemaViolationError(schemaName, issues, { cause: error });
  }
}

export class CollaboratorUnavailableError extends ExtractionError {
  readonly code = 'COLLABORATOR_UNAVAILABLE';
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

export const isExtractionError = (error: unknown): error is ExtractionError =>
  error instanceof ExtractionError;
