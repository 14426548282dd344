import { getLogger } from '@bullion-ledger/logger';
import type { Decimal } from 'decimal.js';

import type { LotLedger, MaterialType } from '../domain/types.js';
import { findAvailableUnits } from '../ledger/unit-availability-utils.js';

import { DEFAULT_RECONCILIATION_CONFIG, type ReconciliationConfig } from './reconciliation-config.js';
import {
  calculateRemainingQuantity,
  calculateRemainingWeight,
  calculateTotalContributed,
  calculateTotalSold,
} from './remaining-quantity-utils.js';

const logger = getLogger('LotReconciler');

export interface LotReconciliation {
  lotId: string;
  materialType: MaterialType;
  requestedQuantity: Decimal;
  totalSold: Decimal;
  totalContributed: Decimal;
  availableUnitCount: number;
  remainingQuantity: Decimal | null;
  remainingWeight: Decimal | null;
}

export function reconcileLot(
  ledger: LotLedger,
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG
): LotReconciliation {
  const reconciliation: LotReconciliation = {
    lotId: ledger.lot.id,
    materialType: ledger.lot.material.materialType,
    requestedQuantity: ledger.lot.requestedQuantity,
    totalSold: calculateTotalSold(ledger),
    totalContributed: calculateTotalContributed(ledger, config),
    availableUnitCount: findAvailableUnits(ledger).length,
    remainingQuantity: calculateRemainingQuantity(ledger, config),
    remainingWeight: calculateRemainingWeight(ledger),
  };

  logger.debug(
    {
      lotId: reconciliation.lotId,
      totalSold: reconciliation.totalSold.toFixed(),
      totalContributed: reconciliation.totalContributed.toFixed(),
      availableUnitCount: reconciliation.availableUnitCount,
      remainingQuantity: reconciliation.remainingQuantity?.toFixed() ?? null,
      remainingWeight: reconciliation.remainingWeight?.toFixed() ?? null,
    },
    'Reconciled lot'
  );

  return reconciliation;
}
