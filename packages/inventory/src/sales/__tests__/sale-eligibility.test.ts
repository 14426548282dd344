import { parseDecimal } from '@bullion-ledger/core';
import { describe, expect, it } from 'vitest';

import { createLotLedger } from '../../domain/lot-ledger.js';
import { createLot, createSaleLot, createUnits } from '../../test-utils/builders.js';
import { SaleRejectedError, validateSaleQuantity } from '../sale-eligibility.js';

describe('validateSaleQuantity', () => {
  const lot = createLot();
  const ledger = createLotLedger(lot, { units: createUnits(lot.id, 5) });

  it('returns the remaining quantity when the sale fits', () => {
    const result = validateSaleQuantity(ledger, parseDecimal('5'));

    expect(result._unsafeUnwrap().toFixed()).toBe('5');
  });

  it('rejects a sale from a lot that is not a purchase', () => {
    const sale = createLotLedger(createSaleLot(lot, '1'));

    expect(validateSaleQuantity(sale, parseDecimal('1'))._unsafeUnwrapErr().reason).toBe('not_purchase_lot');
  });

  it.each(['pending', 'rejected', 'confirmed'] as const)('rejects a %s purchase lot', (status) => {
    const result = validateSaleQuantity(createLotLedger(createLot({ status })), parseDecimal('1'));

    expect(result._unsafeUnwrapErr().reason).toBe('lot_not_eligible');
  });

  it('rejects a non-positive quantity', () => {
    expect(validateSaleQuantity(ledger, parseDecimal('0'))._unsafeUnwrapErr().reason).toBe('invalid_quantity');
  });

  it('rejects a lot with nothing left', () => {
    const soldOut = createLotLedger(lot, {
      saleLots: [createSaleLot(lot, '5')],
      units: createUnits(lot.id, 5).map((unit) => ({ ...unit, saleLotId: `sale-${lot.id}` })),
    });

    const error = validateSaleQuantity(soldOut, parseDecimal('1'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(SaleRejectedError);
    expect(error.reason).toBe('already_sold');
  });

  it('rejects more than the lot has left', () => {
    const partlySold = createLotLedger(lot, {
      saleLots: [createSaleLot(lot, '3')],
      units: createUnits(lot.id, 5),
    });

    const error = validateSaleQuantity(partlySold, parseDecimal('2.5'))._unsafeUnwrapErr();

    expect(error.reason).toBe('exceeds_available');
    expect(error.message).toBe('Requested quantity exceeds available quantity (2)');
  });
});
