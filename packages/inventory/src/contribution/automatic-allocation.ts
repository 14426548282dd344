import { Decimal } from 'decimal.js';

import type { LotLedger, MaterialSpec, RequirementMaterial } from '../domain/types.js';
import { DEFAULT_RECONCILIATION_CONFIG, type ReconciliationConfig } from '../reconciliation/reconciliation-config.js';
import { calculateRemainingQuantity } from '../reconciliation/remaining-quantity-utils.js';

import type { ContributionProposal } from './contribution-validator.js';
import { buildRequirementKey } from './material-key-utils.js';
import { calculateLineRequiredWeight, type MaterialRequirementLine } from './requirement-utils.js';

export interface RequirementShortfall {
  label: string;
  remainingWeight: Decimal;
}

export interface AutomaticContributionPlan {
  proposals: ContributionProposal[];
  shortfalls: RequirementShortfall[];
}

/**
 * Whether a lot's material can serve a requirement line: metals by item and
 * carat, stones by item and shape, anything else by item.
 */
export function lotMatchesRequirement(lotMaterial: MaterialSpec, required: RequirementMaterial): boolean {
  if (lotMaterial.materialType !== required.materialType || lotMaterial.materialItemId !== required.materialItemId) {
    return false;
  }

  switch (required.materialType) {
    case 'metal':
      return lotMaterial.caratTypeId === required.caratTypeId;
    case 'stone':
      return lotMaterial.shapeCutId === required.shapeCutId;
    case 'other':
      return true;
  }
}

function findCandidateLedgers(line: MaterialRequirementLine, ledgers: readonly LotLedger[]): LotLedger[] {
  return ledgers.filter(
    ({ lot }) => lot.requestType === 'purchase' && lotMatchesRequirement(lot.material, line.material)
  );
}

/**
 * Pick whole units from matching lots, in the given lot order, until each
 * requirement line is covered. A lot is drawn down across lines.
 */
export function planAutomaticContributions(
  lines: readonly MaterialRequirementLine[],
  ledgers: readonly LotLedger[],
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG
): AutomaticContributionPlan {
  const planned = new Map<string, { ledger: LotLedger; quantity: Decimal }>();
  const shortfalls: RequirementShortfall[] = [];

  for (const line of lines) {
    let required = calculateLineRequiredWeight(line);
    if (required.lte(0)) continue;

    for (const ledger of findCandidateLedgers(line, ledgers)) {
      if (required.lte(0)) break;

      const unitWeight = ledger.lot.material.unitWeight;
      if (!unitWeight || unitWeight.lte(0)) continue;

      const alreadyPlanned = planned.get(ledger.lot.id)?.quantity ?? new Decimal(0);
      const remaining = calculateRemainingQuantity(ledger, config) ?? new Decimal(0);
      const availableUnits = remaining.floor().minus(alreadyPlanned);
      if (availableUnits.lte(0)) continue;

      const maxUnits = required.dividedToIntegerBy(unitWeight);
      if (maxUnits.lte(0)) continue;

      const assigned = Decimal.min(availableUnits, maxUnits);
      planned.set(ledger.lot.id, { ledger, quantity: alreadyPlanned.plus(assigned) });
      required = required.minus(assigned.times(unitWeight));
    }

    if (required.gt(0)) {
      shortfalls.push({ label: buildRequirementKey(line.material).label, remainingWeight: required });
    }
  }

  return { proposals: [...planned.values()], shortfalls };
}

/**
 * Whether the matching lots hold enough whole units to cover every line,
 * each line considered on its own
 */
export function isFulfillmentPossible(
  lines: readonly MaterialRequirementLine[],
  ledgers: readonly LotLedger[],
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG
): boolean {
  return lines.every((line) => {
    const required = calculateLineRequiredWeight(line);
    const availableWeight = findCandidateLedgers(line, ledgers).reduce((total, ledger) => {
      const unitWeight = ledger.lot.material.unitWeight;
      if (!unitWeight || unitWeight.lte(0)) return total;
      const remaining = calculateRemainingQuantity(ledger, config) ?? new Decimal(0);
      return total.plus(Decimal.max(remaining.floor(), 0).times(unitWeight));
    }, new Decimal(0));

    return availableWeight.gte(required);
  });
}
