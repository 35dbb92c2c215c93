/**
 * Application error taxonomy.
 * Every AppError carries a stable machine-readable code and the HTTP status
 * the error handler maps it to.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Input out of range or malformed. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

/** Unknown tracking id or owner. */
export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, 404, details);
  }
}

/** Linking would make a submission its own ancestor. */
export class CycleError extends AppError {
  constructor(parentId: string, childId: string) {
    super(
      'LINEAGE_CYCLE',
      `Linking "${parentId}" → "${childId}" would create a cycle`,
      409,
      { parentId, childId }
    );
  }
}

/** The child already refines another submission. */
export class MultipleParentError extends AppError {
  constructor(childId: string, existingParentId: string) {
    super(
      'MULTIPLE_PARENTS',
      `Submission "${childId}" already has parent "${existingParentId}"`,
      409,
      { childId, existingParentId }
    );
  }
}

/** An ancestor walk exceeded the configured safety bound. */
export class TruncatedError extends AppError {
  constructor(startId: string, limit: number) {
    super(
      'LINEAGE_TRUNCATED',
      `Ancestor walk from "${startId}" exceeded the limit of ${limit} steps`,
      422,
      { startId, limit }
    );
  }
}

/**
 * A chain's root or version changed between planning a write and committing
 * it. Writers re-plan on this; it only reaches a caller when retries run out.
 */
export class ChainMovedError extends AppError {
  constructor(trackingId: string) {
    super(
      'CHAIN_MOVED',
      `Lineage chain of "${trackingId}" changed while the write was planned`,
      409,
      { trackingId }
    );
  }
}

/**
 * Non-fatal anomaly. The offending value has already been corrected;
 * callers log it and carry on.
 */
export class DataIntegrityWarning {
  readonly name = 'DataIntegrityWarning';

  constructor(
    readonly code: string,
    readonly message: string,
    readonly details?: Record<string, unknown>
  ) {}

  toJSON(): { code: string; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
