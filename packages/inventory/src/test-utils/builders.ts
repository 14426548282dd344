import { parseDecimal } from '@bullion-ledger/core';

import type {
  Contribution,
  ContributionTarget,
  ContractUnitHistory,
  InventoryUnit,
  MaterialSpec,
  ProductionAllocation,
  PurchaseLot,
} from '../domain/types.js';

const CREATED_AT = new Date('2025-03-01T09:00:00.000Z');

export const GOLD_24K: MaterialSpec = {
  materialType: 'metal',
  materialItemId: 'gold',
  materialItemName: 'Gold',
  caratTypeId: '24k',
  unitWeight: parseDecimal('10'),
};

export const RUBY_OVAL: MaterialSpec = {
  materialType: 'stone',
  materialItemId: 'ruby',
  materialItemName: 'Ruby',
  shapeCutId: 'oval',
  unitWeight: parseDecimal('0.5'),
};

export function createLot(overrides: Partial<PurchaseLot> = {}): PurchaseLot {
  return {
    id: 'lot-1',
    requestType: 'purchase',
    status: 'approved',
    requestedQuantity: parseDecimal('5'),
    material: GOLD_24K,
    createdAt: CREATED_AT,
    ...overrides,
  };
}

export function createSaleLot(purchaseLot: PurchaseLot, quantity: string, overrides: Partial<PurchaseLot> = {}): PurchaseLot {
  return {
    id: `sale-${purchaseLot.id}`,
    requestType: 'sale',
    status: 'approved',
    requestedQuantity: parseDecimal(quantity),
    material: purchaseLot.material,
    relatedLotId: purchaseLot.id,
    createdAt: CREATED_AT,
    ...overrides,
  };
}

/**
 * Units `<lotId>-u1` … `<lotId>-u<count>`
 */
export function createUnits(lotId: string, count: number): InventoryUnit[] {
  return Array.from({ length: count }, (_, index) => ({
    id: `${lotId}-u${index + 1}`,
    lotId,
    serialNumber: `SN-${index + 1}`,
  }));
}

export function createContribution(
  lotId: string,
  quantity: string,
  overrides: Partial<Contribution> = {}
): Contribution {
  return {
    id: `contribution-${lotId}-${quantity}`,
    lotId,
    quantity: parseDecimal(quantity),
    status: 'approved',
    target: { type: 'pool', poolId: 'pool-1' },
    createdAt: CREATED_AT,
    ...overrides,
  };
}

export function contractTarget(contractId: string): ContributionTarget {
  return { type: 'contract', contractId };
}

export function createHistory(id: string, unitId: string, contractId: string, weight = '10'): ContractUnitHistory {
  return { id, unitId, contractId, contributedWeight: parseDecimal(weight), createdAt: CREATED_AT };
}

export function directAllocation(id: string, unitId: string, weight: string): ProductionAllocation {
  return {
    id,
    productionPaymentId: 'payment-1',
    source: { kind: 'unit', unitId },
    weight: parseDecimal(weight),
  };
}

export function historyAllocation(id: string, history: ContractUnitHistory, weight: string): ProductionAllocation {
  return {
    id,
    productionPaymentId: 'payment-1',
    source: { kind: 'contract_history', historyId: history.id, unitId: history.unitId },
    contractId: history.contractId,
    weight: parseDecimal(weight),
  };
}
