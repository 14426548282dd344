import { InvalidTransitionError } from '@bullion-ledger/core';
import { describe, expect, it } from 'vitest';

import { createContribution } from '../../test-utils/builders.js';
import { isValidContributionTransition, transitionContribution } from '../contribution-lifecycle.js';

describe('contribution lifecycle', () => {
  it.each([
    ['pending', 'admin_approved'],
    ['pending', 'approved'],
    ['pending', 'rejected'],
    ['admin_approved', 'approved'],
    ['admin_approved', 'rejected'],
    ['approved', 'terminated'],
    ['approved', 'rejected'],
  ] as const)('allows %s → %s', (from, to) => {
    expect(isValidContributionTransition(from, to)).toBe(true);
  });

  it.each([
    ['pending', 'terminated'],
    ['admin_approved', 'terminated'],
    ['approved', 'pending'],
    ['terminated', 'approved'],
    ['terminated', 'rejected'],
    ['rejected', 'pending'],
  ] as const)('refuses %s → %s', (from, to) => {
    expect(isValidContributionTransition(from, to)).toBe(false);
  });

  it('returns the contribution with its new status', () => {
    const contribution = createContribution('lot-1', '2', { status: 'pending' });

    const result = transitionContribution(contribution, 'approved');

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap().status).toBe('approved');
    expect(contribution.status).toBe('pending');
  });

  it('reports the refused transition', () => {
    const contribution = createContribution('lot-1', '2', { status: 'rejected' });

    const result = transitionContribution(contribution, 'approved');

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(InvalidTransitionError);
    expect(error.message).toBe('Cannot transition from rejected to approved');
    expect(error.context).toEqual({ contributionId: contribution.id });
  });
});
