import { DomainError, type DomainErrorContext } from '@bullion-ledger/core';

export type ContributionRejectionReason =
  | 'no_contributions'
  | 'invalid_quantity'
  | 'lot_not_allocatable'
  | 'exceeds_available'
  | 'material_mismatch'
  | 'missing_material_data'
  | 'exceeds_limit'
  | 'insufficient_total';

/**
 * A set of proposed contributions was refused as a whole
 */
export class ContributionRejectedError extends DomainError {
  readonly code = 'CONTRIBUTION_REJECTED';
  readonly severity = 'error' as const;

  constructor(
    public readonly reason: ContributionRejectionReason,
    message: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}
