/**
 * Domain error hierarchy
 *
 * Every error raised by the ledger carries a machine-readable code and a
 * severity so the service layer can map it to a user-facing message.
 */

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  requestId?: string | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly requestId?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.requestId = context?.requestId;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      requestId: this.requestId,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Repository-related errors
 */
export class RepositoryError extends DomainError {
  readonly severity = 'error' as const;

  constructor(
    public readonly code: 'NOT_FOUND' | 'VALIDATION_FAILED' | 'CONSTRAINT_VIOLATION',
    message: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * Rejected state change of a lifecycle-managed record
 */
export class InvalidTransitionError extends DomainError {
  readonly code = 'INVALID_TRANSITION';
  readonly severity = 'error' as const;

  constructor(
    public readonly from: string,
    public readonly to: string,
    context?: DomainErrorContext
  ) {
    super(`Cannot transition from ${from} to ${to}`, context);
  }
}
