import { clampToZero, QUANTITY_DECIMAL_PLACES, roundTo, safeDivide, sumDecimals } from '@bullion-ledger/core';
import { Decimal } from 'decimal.js';

import type { Contribution, ContributionStatus, LotLedger, LotStatus } from '../domain/types.js';
import { findAvailableUnits } from '../ledger/unit-availability-utils.js';
import { getUnitRemainingWeight } from '../ledger/unit-weight-utils.js';

import { calculateContributionUsage } from './contribution-usage-utils.js';
import { DEFAULT_RECONCILIATION_CONFIG, type ReconciliationConfig } from './reconciliation-config.js';

/**
 * Sale lot statuses that hold quantity of their purchase lot
 */
export const ALLOCATING_SALE_STATUSES: readonly LotStatus[] = [
  'pending',
  'approved',
  'completed',
  'pending_seller_price',
  'pending_investor_confirmation',
];

/**
 * Contribution statuses counted against a lot
 */
export const COUNTED_CONTRIBUTION_STATUSES: readonly ContributionStatus[] = [
  'pending',
  'admin_approved',
  'approved',
  'terminated',
];

export function calculateTotalSold(ledger: LotLedger): Decimal {
  return sumDecimals(
    ledger.saleLots
      .filter(
        (saleLot) =>
          saleLot.requestType === 'sale' &&
          saleLot.relatedLotId === ledger.lot.id &&
          ALLOCATING_SALE_STATUSES.includes(saleLot.status)
      )
      .map((saleLot) => saleLot.requestedQuantity)
  );
}

/**
 * Quantity a terminated contribution still holds: only what production used
 */
function calculateTerminatedQuantity(
  contribution: Contribution,
  ledger: LotLedger,
  config: ReconciliationConfig
): Decimal {
  const usage = calculateContributionUsage(contribution, ledger);

  // Usage unknown: keep the whole contribution allocated
  if (usage.isErr()) {
    return contribution.quantity;
  }

  if (usage.value.kind === 'weight') {
    return safeDivide(usage.value.usedWeight, ledger.lot.material.unitWeight);
  }

  if (config.terminatedStoneUsage === 'allocated_units') {
    return Decimal.min(contribution.quantity, usage.value.usedQuantity);
  }

  return contribution.quantity;
}

export function calculateContributedQuantity(
  contribution: Contribution,
  ledger: LotLedger,
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG
): Decimal {
  switch (contribution.status) {
    case 'pending':
    case 'admin_approved':
    case 'approved':
      return contribution.quantity;
    case 'terminated':
      return calculateTerminatedQuantity(contribution, ledger, config);
    case 'rejected':
      return new Decimal(0);
  }
}

export function calculateTotalContributed(
  ledger: LotLedger,
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG
): Decimal {
  return sumDecimals(
    ledger.contributions
      .filter(
        (contribution) =>
          contribution.lotId === ledger.lot.id && COUNTED_CONTRIBUTION_STATUSES.includes(contribution.status)
      )
      .map((contribution) => calculateContributedQuantity(contribution, ledger, config))
  );
}

/**
 * Quantity of the lot still free for sale, pool or contract allocation.
 *
 * Bounded twice: by the ledger (requested less sold less contributed) and by
 * what the available units physically still hold. Sale lots have no remaining
 * quantity of their own (null); resolve them to their purchase lot first.
 */
export function calculateRemainingQuantity(
  ledger: LotLedger,
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG
): Decimal | null {
  const { lot } = ledger;

  if (lot.requestType === 'jewelry_design') {
    return lot.requestedQuantity;
  }
  if (lot.requestType === 'sale') {
    return null;
  }
  if (lot.status === 'pending') {
    return lot.requestedQuantity;
  }

  const baseRemaining = lot.requestedQuantity
    .minus(calculateTotalSold(ledger))
    .minus(calculateTotalContributed(ledger, config));
  const availableUnits = findAvailableUnits(ledger);

  if (lot.material.materialType === 'metal') {
    const unitWeight = lot.material.unitWeight;
    if (!unitWeight || unitWeight.lte(0)) {
      return new Decimal(0);
    }

    const totalRemainingWeight = sumDecimals(availableUnits.map((unit) => getUnitRemainingWeight(unit, ledger)));
    const quantityFromWeight = totalRemainingWeight.dividedBy(unitWeight);

    return clampToZero(roundTo(Decimal.min(quantityFromWeight, baseRemaining), QUANTITY_DECIMAL_PLACES));
  }

  return clampToZero(Decimal.min(new Decimal(availableUnits.length), baseRemaining).floor());
}

/**
 * Grams (metal) or unit count (stone) still held by the available units.
 * No ledger cross-check; may disagree with remaining quantity × unit weight.
 */
export function calculateRemainingWeight(ledger: LotLedger): Decimal | null {
  if (ledger.lot.requestType === 'sale') {
    return null;
  }

  return sumDecimals(findAvailableUnits(ledger).map((unit) => clampToZero(getUnitRemainingWeight(unit, ledger))));
}
