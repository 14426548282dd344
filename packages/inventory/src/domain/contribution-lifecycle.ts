import { InvalidTransitionError } from '@bullion-ledger/core';
import { err, ok, type Result } from 'neverthrow';

import type { Contribution, ContributionStatus } from './types.js';

/**
 * Allowed contribution status transitions
 *
 * Terminated and rejected are final.
 */
export const CONTRIBUTION_STATUS_TRANSITIONS: Readonly<Record<ContributionStatus, readonly ContributionStatus[]>> = {
  pending: ['admin_approved', 'approved', 'rejected'],
  admin_approved: ['approved', 'rejected'],
  approved: ['terminated', 'rejected'],
  terminated: [],
  rejected: [],
};

export function isValidContributionTransition(from: ContributionStatus, to: ContributionStatus): boolean {
  return CONTRIBUTION_STATUS_TRANSITIONS[from].includes(to);
}

export function transitionContribution(
  contribution: Contribution,
  to: ContributionStatus
): Result<Contribution, InvalidTransitionError> {
  if (!isValidContributionTransition(contribution.status, to)) {
    return err(
      new InvalidTransitionError(contribution.status, to, {
        additionalContext: { contributionId: contribution.id },
      })
    );
  }

  return ok({ ...contribution, status: to });
}
