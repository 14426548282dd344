import { RepositoryError, parseDecimal } from '@bullion-ledger/core';
import { closeDatabase, type KyselyDB } from '@bullion-ledger/data';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { RUBY_OVAL, createLot, createSaleLot } from '../../test-utils/builders.js';
import { createTestDatabase } from '../../test-utils/database.js';
import { PurchaseLotRepository } from '../purchase-lot-repository.js';

describe('PurchaseLotRepository', () => {
  let db: KyselyDB;
  let repository: PurchaseLotRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new PurchaseLotRepository(db);
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  it('stores and reads back a lot', async () => {
    const lot = createLot({ businessId: 'business-1', requestedQuantity: parseDecimal('2.5') });

    expect((await repository.createLot(lot))._unsafeUnwrap()).toBe('lot-1');
    const found = (await repository.findLotById('lot-1'))._unsafeUnwrap();

    expect(found).toEqual(lot);
    expect(found?.requestedQuantity.toFixed()).toBe('2.5');
    expect(found?.material.unitWeight?.toFixed()).toBe('10');
  });

  it('stores a sale lot pointing at its purchase lot', async () => {
    const lot = createLot();
    await repository.createLot(lot);
    await repository.createLot(createSaleLot(lot, '1'));

    const sale = (await repository.findLotById('sale-lot-1'))._unsafeUnwrap();

    expect(sale?.requestType).toBe('sale');
    expect(sale?.relatedLotId).toBe('lot-1');
  });

  it('returns null for an unknown lot', async () => {
    expect((await repository.findLotById('missing'))._unsafeUnwrap()).toBeNull();
  });

  it('hides soft-deleted lots unless asked', async () => {
    await repository.createLot(createLot({ deletedAt: new Date('2025-04-01T00:00:00.000Z') }));

    expect((await repository.findLotById('lot-1'))._unsafeUnwrap()).toBeNull();
    expect((await repository.findLotById('lot-1', { includeDeleted: true }))._unsafeUnwrap()?.id).toBe('lot-1');
  });

  it('updates the lot status', async () => {
    await repository.createLot(createLot({ status: 'pending' }));

    expect((await repository.updateLotStatus('lot-1', 'approved'))._unsafeUnwrap()).toBe(true);
    expect((await repository.findLotById('lot-1'))._unsafeUnwrap()?.status).toBe('approved');
  });

  describe('units', () => {
    beforeEach(async () => {
      await repository.createLot(createLot());
    });

    it('mints units in bulk', async () => {
      const units = (
        await repository.mintUnits('lot-1', [{ serialNumber: 'SN-1' }, { serialNumber: 'SN-2', systemSerialNumber: 'SYS-2' }])
      )._unsafeUnwrap();

      expect(units.map((unit) => unit.serialNumber)).toEqual(['SN-1', 'SN-2']);
      expect(units[1]?.systemSerialNumber).toBe('SYS-2');
      expect(units[0]?.lotId).toBe('lot-1');
      expect(units[0]?.saleLotId).toBeUndefined();
    });

    it('refuses duplicate serial numbers within a lot', async () => {
      await repository.mintUnits('lot-1', [{ serialNumber: 'SN-1' }]);

      const result = await repository.mintUnits('lot-1', [{ serialNumber: 'SN-1' }]);

      expect(result.isErr()).toBe(true);
    });

    it('keeps a single allocation pointer per unit', async () => {
      await repository.createLot(createSaleLot(createLot(), '1'));
      const [unit] = (await repository.mintUnits('lot-1', [{ serialNumber: 'SN-1' }]))._unsafeUnwrap();
      if (!unit) throw new Error('expected a unit');

      await repository.setUnitAllocation([unit.id], { type: 'pool', poolId: 'pool-1' });
      await repository.setUnitAllocation([unit.id], { type: 'sale', saleLotId: 'sale-lot-1' });

      const row = await db.selectFrom('inventory_units').selectAll().where('id', '=', unit.id).executeTakeFirstOrThrow();
      expect(row.sale_lot_id).toBe('sale-lot-1');
      expect(row.pool_id).toBeNull();
      expect(row.contract_id).toBeNull();
    });

    it('reports units it could not find', async () => {
      const result = await repository.setUnitAllocation(['missing-unit'], { type: 'none' });

      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(RepositoryError);
      expect(error.message).toBe('Expected to update 1 units, updated 0');
    });

    it('soft-deletes a unit once', async () => {
      const [unit] = (await repository.mintUnits('lot-1', [{ serialNumber: 'SN-1' }]))._unsafeUnwrap();
      if (!unit) throw new Error('expected a unit');

      expect((await repository.softDeleteUnit(unit.id))._unsafeUnwrap()).toBe(true);
      expect((await repository.softDeleteUnit(unit.id))._unsafeUnwrap()).toBe(false);
    });
  });

  it('lists allocatable lots of a material item, oldest first', async () => {
    await repository.createLot(createLot({ id: 'lot-new', createdAt: new Date('2025-05-01T00:00:00.000Z') }));
    await repository.createLot(createLot({ id: 'lot-old', createdAt: new Date('2025-01-01T00:00:00.000Z') }));
    await repository.createLot(createLot({ id: 'lot-pending', status: 'pending' }));
    await repository.createLot(createLot({ id: 'lot-ruby', material: RUBY_OVAL }));

    const ids = (await repository.findAllocatableLotIds('metal', 'gold'))._unsafeUnwrap();

    expect(ids).toEqual(['lot-old', 'lot-new']);
  });
});
