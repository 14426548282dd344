import { clampToZero } from '@bullion-ledger/core';
import { Decimal } from 'decimal.js';

import type { InventoryUnit, LotLedger, MaterialSpec, UnitConsumption } from '../domain/types.js';

import { getConsumedWeight } from './production-consumption-utils.js';

/**
 * Remaining weight of a single unit.
 *
 * Metal: per-unit weight less everything production consumed, floored at 0.
 * A metal unit without a known weight has nothing left.
 * Stones and other materials are counted, not weighed: always 1.
 */
export function calculateUnitRemainingWeight(
  material: MaterialSpec,
  consumption: UnitConsumption | undefined
): Decimal {
  if (material.materialType !== 'metal') {
    return new Decimal(1);
  }

  if (!material.unitWeight) {
    return new Decimal(0);
  }

  return clampToZero(material.unitWeight.minus(getConsumedWeight(consumption)));
}

export function getUnitRemainingWeight(unit: InventoryUnit, ledger: LotLedger): Decimal {
  return calculateUnitRemainingWeight(ledger.lot.material, ledger.consumption.get(unit.id));
}
