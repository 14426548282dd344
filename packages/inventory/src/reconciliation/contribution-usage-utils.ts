import { roundTo, WEIGHT_DECIMAL_PLACES } from '@bullion-ledger/core';
import { getLogger } from '@bullion-ledger/logger';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { Contribution, LotLedger } from '../domain/types.js';
import { hasProductionAllocations } from '../ledger/production-consumption-utils.js';
import { getUnitRemainingWeight } from '../ledger/unit-weight-utils.js';

import { ReconciliationError } from './errors.js';

const logger = getLogger('ContributionUsage');

/**
 * How much of a contribution production has already consumed.
 * Metal lots report grams, stone and other lots report unit counts.
 */
export type ContributionUsage =
  | { kind: 'weight'; totalWeight: Decimal; usedWeight: Decimal; unusedWeight: Decimal }
  | { kind: 'count'; usedQuantity: Decimal; unusedQuantity: Decimal };

function contractIdOf(contribution: Contribution): string | undefined {
  return contribution.target.type === 'contract' ? contribution.target.contractId : undefined;
}

/**
 * Split a contribution into used and unused portions.
 *
 * Metal counts a unit as touched when production allocated from it or when it
 * carries a history row for the contribution's contract; every touched unit
 * contributes its consumed grams. Stones, and materials of type `other`, count
 * the units production allocated from, directly or through a history row.
 */
export function calculateContributionUsage(
  contribution: Contribution,
  ledger: LotLedger
): Result<ContributionUsage, ReconciliationError> {
  const { material } = ledger.lot;
  const liveUnits = ledger.units.filter((unit) => !unit.deletedAt);

  // Material type `other` is split by unit count like a stone
  if (material.materialType !== 'metal') {
    const usedQuantity = liveUnits.filter((unit) => hasProductionAllocations(ledger.consumption.get(unit.id))).length;

    return ok({
      kind: 'count',
      usedQuantity: new Decimal(usedQuantity),
      unusedQuantity: new Decimal(liveUnits.length - usedQuantity),
    });
  }

  const unitWeight = material.unitWeight;
  if (!unitWeight) {
    return err(
      new ReconciliationError('missing_material_data', `Lot ${ledger.lot.id} has no unit weight on record`, {
        additionalContext: { contributionId: contribution.id, lotId: ledger.lot.id },
      })
    );
  }

  const contractId = contractIdOf(contribution);
  const contractUnitIds = new Set(
    ledger.contractHistories
      .filter((history) => contractId !== undefined && history.contractId === contractId)
      .map((history) => history.unitId)
  );

  let usedWeight = new Decimal(0);
  for (const unit of liveUnits) {
    if (!hasProductionAllocations(ledger.consumption.get(unit.id)) && !contractUnitIds.has(unit.id)) {
      continue;
    }
    usedWeight = usedWeight.plus(unitWeight.minus(getUnitRemainingWeight(unit, ledger)));
  }

  const totalWeight = roundTo(contribution.quantity.times(unitWeight), WEIGHT_DECIMAL_PLACES);
  const roundedUsed = roundTo(usedWeight, WEIGHT_DECIMAL_PLACES);

  return ok({
    kind: 'weight',
    totalWeight,
    usedWeight: roundedUsed,
    unusedWeight: roundTo(totalWeight.minus(roundedUsed), WEIGHT_DECIMAL_PLACES),
  });
}

/**
 * Read-path variant: a failed computation is logged and reported as "unknown"
 * (null) for metal, or as zero counts for stones.
 */
export function getContributionUsageOrDefault(contribution: Contribution, ledger: LotLedger): ContributionUsage | null {
  const result = calculateContributionUsage(contribution, ledger);

  if (result.isOk()) {
    return result.value;
  }

  logger.warn(
    { contributionId: contribution.id, lotId: ledger.lot.id, reason: result.error.reason },
    `Could not compute contribution usage: ${result.error.message}`
  );

  if (ledger.lot.material.materialType === 'metal') {
    return null;
  }

  return { kind: 'count', usedQuantity: new Decimal(0), unusedQuantity: new Decimal(0) };
}
