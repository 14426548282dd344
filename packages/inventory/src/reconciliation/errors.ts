import { DomainError, type DomainErrorContext } from '@bullion-ledger/core';

export type ReconciliationFailureReason = 'missing_material_data';

/**
 * A lot's figures cannot be computed from the data on record
 */
export class ReconciliationError extends DomainError {
  readonly code = 'RECONCILIATION_FAILED';
  readonly severity = 'error' as const;

  constructor(
    public readonly reason: ReconciliationFailureReason,
    message: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}
