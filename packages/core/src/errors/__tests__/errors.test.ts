import { describe, expect, it } from 'vitest';

import { DomainError, InvalidTransitionError, RepositoryError } from '../index.js';

describe('DomainError', () => {
  it('should expose code, severity and context in JSON form', () => {
    const error = new RepositoryError('VALIDATION_FAILED', 'Quantity must be positive', {
      additionalContext: { quantity: '-1' },
      requestId: 'req-1',
    });

    const json = error.toJSON();

    expect(json.code).toBe('VALIDATION_FAILED');
    expect(json.severity).toBe('error');
    expect(json.context).toEqual({ quantity: '-1' });
    expect(json.requestId).toBe('req-1');
    expect(json.name).toBe('RepositoryError');
  });

  it('should carry repository codes', () => {
    const error = new RepositoryError('NOT_FOUND', 'Lot lot-1 not found');

    expect(error.code).toBe('NOT_FOUND');
    expect(error.message).toBe('Lot lot-1 not found');
  });

  it('should describe invalid transitions', () => {
    const error = new InvalidTransitionError('rejected', 'approved');

    expect(error.message).toBe('Cannot transition from rejected to approved');
    expect(error.from).toBe('rejected');
    expect(error.to).toBe('approved');
  });

  it('should share the domain error base', () => {
    expect(new InvalidTransitionError('approved', 'pending')).toBeInstanceOf(DomainError);
  });
});
