/**
 * Error types for the Remedy core.
 *
 * Every error carries a stable `code` so callers (CLI, transports) can map
 * failures without matching on message text.
 */

export type RemedyErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'ALREADY_FINALIZED'
  | 'LIST_CLOSED'
  | 'NOT_ASSIGNEE'
  | 'UNKNOWN_ADMIN'
  | 'CONFLICT'
  | 'EXTERNAL_DELIVERY_FAILURE'
  | 'VALIDATION';

/**
 * Base class for all Remedy-specific errors.
 */
export class RemedyError extends Error {
  constructor(message: string, public readonly code: RemedyErrorCode) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A referenced entity does not exist.
 */
export class RecordNotFoundError extends RemedyError {
  constructor(public readonly recordType: string, public readonly recordId: string) {
    super(`${recordType} with id ${recordId} not found`, 'NOT_FOUND');
  }
}

/**
 * The operation is not legal in the entity's current state.
 */
export class InvalidStateError extends RemedyError {
  constructor(message: string, code: RemedyErrorCode = 'INVALID_STATE') {
    super(message, code);
  }
}

export class AlreadyFinalizedError extends InvalidStateError {
  constructor(public readonly reportId: string, public readonly status: string) {
    super(`Report ${reportId} is already finalized (${status})`, 'ALREADY_FINALIZED');
  }
}

export class ListClosedError extends InvalidStateError {
  constructor(public readonly listCode: string) {
    super(`Problem list ${listCode} is closed`, 'LIST_CLOSED');
  }
}

export class NotAssigneeError extends InvalidStateError {
  constructor(public readonly problemId: string, public readonly userId: string) {
    super(`User ${userId} is not assigned to problem ${problemId}`, 'NOT_ASSIGNEE');
  }
}

/**
 * The caller is not a known admin of either tier.
 */
export class UnknownAdminError extends RemedyError {
  constructor(public readonly adminId: string) {
    super(`User ${adminId} is not a known admin`, 'UNKNOWN_ADMIN');
  }
}

/**
 * A uniqueness constraint would be violated.
 */
export class ConflictError extends RemedyError {
  constructor(public readonly recordType: string, public readonly recordId: string) {
    super(`${recordType} with id ${recordId} already exists`, 'CONFLICT');
  }
}

/**
 * A notification or document send failed. Logged and skipped by callers.
 */
export class ExternalDeliveryError extends RemedyError {
  constructor(public readonly recipientId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Delivery to ${recipientId} failed: ${reason}`, 'EXTERNAL_DELIVERY_FAILURE');
  }
}

/**
 * Schema validation failed with one or more field errors.
 */
export class DetailedValidationError extends RemedyError {
  constructor(
    recordType: string,
    public readonly errors: Array<{
      field: string;
      message: string;
      value: unknown;
    }>
  ) {
    const errorSummary = errors
      .map(err => `${err.field}: ${err.message}`)
      .join(', ');

    super(`${recordType} validation failed: ${errorSummary}`, 'VALIDATION');
  }
}

export function isRemedyError(error: unknown): error is RemedyError {
  return error instanceof RemedyError;
}
