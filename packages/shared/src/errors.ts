export type ErrorContext = Record<string, string | number | boolean | undefined>;

/**
 * Base class for failures the pipeline surfaces to its caller
 */
export class PublishError extends Error {
  readonly statusCode: number;
  readonly context: ErrorContext;

  constructor(message: string, statusCode: number, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.context = context;
  }
}

/**
 * Missing path, metadata file, required file or required metadata key.
 * Raised before any side effect.
 */
export class ValidationError extends PublishError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 400, context);
  }
}

/**
 * Store open/prepare/execute failure or transaction conflict
 */
export class PersistenceError extends PublishError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, 500, context, { cause });
  }
}

/**
 * Probe or upload failure. Recovered locally unless the asset is on the
 * critical path of the publish (thumbnail or cover).
 */
export class CollaboratorError extends PublishError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, 500, context, { cause });
  }
}

/**
 * Copy or mkdir failure for a static asset
 */
export class StorageIOError extends PublishError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, 500, context, { cause });
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
