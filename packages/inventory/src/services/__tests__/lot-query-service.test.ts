import { RepositoryError, parseDecimal } from '@bullion-ledger/core';
import { closeDatabase, type KyselyDB } from '@bullion-ledger/data';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ContractRepository } from '../../persistence/contract-repository.js';
import { ContributionRepository } from '../../persistence/contribution-repository.js';
import { PurchaseLotRepository } from '../../persistence/purchase-lot-repository.js';
import { DEFAULT_RECONCILIATION_CONFIG } from '../../reconciliation/reconciliation-config.js';
import { SaleRejectedError } from '../../sales/sale-eligibility.js';
import { RUBY_OVAL, contractTarget, createContribution, createLot, createSaleLot } from '../../test-utils/builders.js';
import { createTestDatabase } from '../../test-utils/database.js';
import { LotQueryService } from '../lot-query-service.js';

describe('LotQueryService', () => {
  let db: KyselyDB;
  let service: LotQueryService;

  beforeEach(async () => {
    db = await createTestDatabase();
    service = new LotQueryService(db, DEFAULT_RECONCILIATION_CONFIG);

    const lots = new PurchaseLotRepository(db);
    const lot = createLot({ id: 'lot-ruby', requestedQuantity: parseDecimal('10'), material: RUBY_OVAL });
    await lots.createLot(lot);
    await lots.createLot(createSaleLot(lot, '3', { id: 'sale-1' }));
    const units = (
      await lots.mintUnits(lot.id, Array.from({ length: 10 }, (_, i) => ({ serialNumber: `R-${String(i + 1).padStart(2, '0')}` })))
    )._unsafeUnwrap();
    await lots.setUnitAllocation(
      units.slice(0, 3).map((unit) => unit.id),
      { type: 'sale', saleLotId: 'sale-1' }
    );
    await lots.setUnitAllocation(
      units.slice(3, 5).map((unit) => unit.id),
      { type: 'pool', poolId: 'pool-1' }
    );
    await new ContributionRepository(db).createContributions([
      createContribution(lot.id, '2', { id: 'c-pool', status: 'pending' }),
      createContribution(lot.id, '1', { id: 'c-rejected', status: 'rejected' }),
    ]);
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  it('reconciles a purchase lot from the database', async () => {
    const reconciliation = (await service.getLotReconciliation('lot-ruby'))._unsafeUnwrap();

    expect(reconciliation.totalSold.toFixed()).toBe('3');
    expect(reconciliation.totalContributed.toFixed()).toBe('2');
    expect(reconciliation.availableUnitCount).toBe(5);
    expect(reconciliation.remainingQuantity?.toFixed()).toBe('5');
  });

  it('resolves a sale lot to the lot it sells from', async () => {
    const reconciliation = (await service.getLotReconciliation('sale-1'))._unsafeUnwrap();

    expect(reconciliation.lotId).toBe('lot-ruby');
  });

  it('reports an unknown lot', async () => {
    const error = (await service.getLotReconciliation('missing'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(RepositoryError);
  });

  it('reports contribution usage', async () => {
    const usage = (await service.getContributionUsage('c-pool'))._unsafeUnwrap();

    expect(usage).toEqual({ kind: 'count', usedQuantity: parseDecimal('0'), unusedQuantity: parseDecimal('10') });
  });

  it('checks a sale against the remaining quantity', async () => {
    expect((await service.checkSaleQuantity('lot-ruby', parseDecimal('5')))._unsafeUnwrap().toFixed()).toBe('5');

    const error = (await service.checkSaleQuantity('lot-ruby', parseDecimal('6')))._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(SaleRejectedError);
    expect(error.message).toBe('Requested quantity exceeds available quantity (5)');
  });

  it('restores the remaining quantity when an approved contribution is rejected', async () => {
    const lots = new PurchaseLotRepository(db);
    const contributions = new ContributionRepository(db);
    await lots.createLot(createLot({ id: 'lot-gold' }));
    await lots.mintUnits('lot-gold', [1, 2, 3, 4, 5].map((n) => ({ serialNumber: `G-${n}` })));
    await new ContractRepository(db).saveContract({ id: 'contract-1', status: 'active' });
    await contributions.createContributions([
      createContribution('lot-gold', '2', { id: 'c-contract', status: 'pending', target: contractTarget('contract-1') }),
    ]);

    expect((await contributions.updateStatus('c-contract', 'approved')).isOk()).toBe(true);
    expect((await service.getLotReconciliation('lot-gold'))._unsafeUnwrap().remainingQuantity?.toFixed()).toBe('3');

    expect((await contributions.updateStatus('c-contract', 'rejected'))._unsafeUnwrap().status).toBe('rejected');
    expect((await service.getLotReconciliation('lot-gold'))._unsafeUnwrap().remainingQuantity?.toFixed()).toBe('5');
  });
});
