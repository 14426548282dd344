import { InvalidTransitionError, RepositoryError } from '@bullion-ledger/core';
import { closeDatabase, type KyselyDB } from '@bullion-ledger/data';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { contractTarget, createContribution, createLot } from '../../test-utils/builders.js';
import { createTestDatabase } from '../../test-utils/database.js';
import { ContractRepository } from '../contract-repository.js';
import { ContributionRepository } from '../contribution-repository.js';
import { PurchaseLotRepository } from '../purchase-lot-repository.js';

describe('ContributionRepository', () => {
  let db: KyselyDB;
  let repository: ContributionRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new ContributionRepository(db);
    await new PurchaseLotRepository(db).createLot(createLot());
    await new ContractRepository(db).saveContract({ id: 'contract-1', status: 'active' });
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  it('stores each target kind in its own column', async () => {
    await repository.createContributions([
      createContribution('lot-1', '1', { id: 'c-pool', createdAt: new Date('2025-03-01T09:00:00.000Z') }),
      createContribution('lot-1', '2', {
        id: 'c-contract',
        target: contractTarget('contract-1'),
        createdAt: new Date('2025-03-02T09:00:00.000Z'),
      }),
      createContribution('lot-1', '0.5', {
        id: 'c-payment',
        createdAt: new Date('2025-03-03T09:00:00.000Z'),
        target: { type: 'production_payment', productionPaymentId: 'payment-1' },
      }),
    ]);

    const found = (await repository.findByLot('lot-1'))._unsafeUnwrap();

    expect(found.map((contribution) => [contribution.id, contribution.target])).toEqual([
      ['c-pool', { type: 'pool', poolId: 'pool-1' }],
      ['c-contract', { type: 'contract', contractId: 'contract-1' }],
      ['c-payment', { type: 'production_payment', productionPaymentId: 'payment-1' }],
    ]);

    const row = await db.selectFrom('contributions').selectAll().where('id', '=', 'c-contract').executeTakeFirstOrThrow();
    expect(row.contribution_type).toBe('contract');
    expect(row.pool_id).toBeNull();
    expect(row.quantity).toBe('2');
  });

  it('moves a contribution through its lifecycle', async () => {
    await repository.createContributions([createContribution('lot-1', '1', { id: 'c-1', status: 'pending' })]);

    expect((await repository.updateStatus('c-1', 'admin_approved'))._unsafeUnwrap().status).toBe('admin_approved');
    expect((await repository.updateStatus('c-1', 'approved'))._unsafeUnwrap().status).toBe('approved');
    expect((await repository.findById('c-1'))._unsafeUnwrap()?.status).toBe('approved');
  });

  it('refuses a transition the lifecycle does not allow', async () => {
    await repository.createContributions([createContribution('lot-1', '1', { id: 'c-1', status: 'rejected' })]);

    const error = (await repository.updateStatus('c-1', 'approved'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InvalidTransitionError);
    expect((await repository.findById('c-1'))._unsafeUnwrap()?.status).toBe('rejected');
  });

  it('reports an unknown contribution', async () => {
    const error = (await repository.updateStatus('missing', 'approved'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(RepositoryError);
    expect(error.message).toBe('Contribution missing not found');
  });

  it('hides soft-deleted contributions unless asked', async () => {
    await repository.createContributions([
      createContribution('lot-1', '1', { id: 'c-1', deletedAt: new Date('2025-04-01T00:00:00.000Z') }),
    ]);

    expect((await repository.findByLot('lot-1'))._unsafeUnwrap()).toEqual([]);
    expect((await repository.findByLot('lot-1', { includeDeleted: true }))._unsafeUnwrap()).toHaveLength(1);
  });
});
