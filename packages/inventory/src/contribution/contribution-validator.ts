import { formatDecimal, QUANTITY_DECIMAL_PLACES, roundTo } from '@bullion-ledger/core';
import { getLogger } from '@bullion-ledger/logger';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { LotLedger, LotStatus } from '../domain/types.js';
import { DEFAULT_RECONCILIATION_CONFIG, type ReconciliationConfig } from '../reconciliation/reconciliation-config.js';
import { calculateRemainingQuantity } from '../reconciliation/remaining-quantity-utils.js';

import { ContributionRejectedError } from './errors.js';
import { buildRequirementKey } from './material-key-utils.js';
import type { MaterialRequirements, RequirementBucket } from './requirement-utils.js';

const logger = getLogger('ContributionValidator');

/**
 * Lot statuses a contribution may draw from
 */
export const ALLOCATABLE_LOT_STATUSES: readonly LotStatus[] = ['approved', 'completed'];

export interface ContributionProposal {
  ledger: LotLedger;
  quantity: Decimal;
}

export interface BucketDeduction {
  bucketKey: string;
  weight: Decimal;
}

export interface AcceptedContribution {
  lotId: string;
  quantity: Decimal;
  contributedWeight: Decimal;
  deductions: BucketDeduction[];
}

export interface ContributionValidation {
  contributions: AcceptedContribution[];
  totalContributedWeight: Decimal;
}

interface BucketShortfall {
  label: string;
  remainingWeight: Decimal;
}

/**
 * Deduct from the buckets with the most remaining first. Buckets already
 * covered are skipped.
 */
function deductGreedily(
  remaining: Map<string, Decimal>,
  buckets: readonly RequirementBucket[],
  weight: Decimal
): BucketDeduction[] {
  const ordered = [...buckets].sort((a, b) =>
    (remaining.get(b.bucketKey) ?? new Decimal(0)).comparedTo(remaining.get(a.bucketKey) ?? new Decimal(0))
  );
  const deductions: BucketDeduction[] = [];
  let toDeduct = weight;

  for (const bucket of ordered) {
    if (toDeduct.lte(0)) break;

    const available = remaining.get(bucket.bucketKey) ?? new Decimal(0);
    if (available.lte(0)) continue;

    const deducted = Decimal.min(toDeduct, available);
    remaining.set(bucket.bucketKey, available.minus(deducted));
    deductions.push({ bucketKey: bucket.bucketKey, weight: deducted });
    toDeduct = toDeduct.minus(deducted);
  }

  return deductions;
}

/**
 * Check proposed lot contributions against a design's material requirements.
 *
 * Every proposal must draw from an allocatable lot, stay within that lot's
 * remaining quantity, match a required material and not exceed what that
 * material still needs. Once all proposals are applied every requirement must
 * be covered. One failing check rejects the whole set.
 */
export function validateContributions(
  requirements: MaterialRequirements,
  proposals: readonly ContributionProposal[],
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG
): Result<ContributionValidation, ContributionRejectedError> {
  if (proposals.length === 0) {
    return err(new ContributionRejectedError('no_contributions', 'At least one asset contribution is required'));
  }

  const remaining = new Map<string, Decimal>();
  for (const bucket of requirements.values()) {
    remaining.set(bucket.bucketKey, bucket.requiredWeight);
  }

  const requestedPerLot = new Map<string, Decimal>();
  const contributions: AcceptedContribution[] = [];
  let totalContributedWeight = new Decimal(0);

  for (const { ledger, quantity } of proposals) {
    const { lot } = ledger;
    const context = { additionalContext: { lotId: lot.id, quantity: quantity.toFixed() } };

    if (quantity.lte(0)) {
      return err(
        new ContributionRejectedError('invalid_quantity', `Contribution quantity must be positive (lot ${lot.id})`, context)
      );
    }

    const availableQuantity = calculateRemainingQuantity(ledger, config);
    if (lot.requestType !== 'purchase' || !ALLOCATABLE_LOT_STATUSES.includes(lot.status) || availableQuantity === null) {
      return err(
        new ContributionRejectedError(
          'lot_not_allocatable',
          `Lot ${lot.id} (${lot.requestType}, ${lot.status}) cannot be contributed`,
          context
        )
      );
    }

    const requestedFromLot = (requestedPerLot.get(lot.id) ?? new Decimal(0)).plus(quantity);
    if (requestedFromLot.gt(availableQuantity)) {
      return err(
        new ContributionRejectedError(
          'exceeds_available',
          `Requested quantity exceeds available quantity for lot ${lot.id}: ${formatDecimal(requestedFromLot)} > ${formatDecimal(availableQuantity)}`,
          context
        )
      );
    }
    requestedPerLot.set(lot.id, requestedFromLot);

    const key = buildRequirementKey(lot.material);
    const matching = [...requirements.values()].filter((bucket) => bucket.matchKey === key.matchKey);
    if (matching.length === 0) {
      return err(
        new ContributionRejectedError(
          'material_mismatch',
          `Lot ${lot.id} [${key.label}] does not match any required material`,
          context
        )
      );
    }

    const unitWeight = lot.material.unitWeight;
    if (!unitWeight || unitWeight.lte(0)) {
      return err(
        new ContributionRejectedError('missing_material_data', `Lot ${lot.id} has no unit weight on record`, context)
      );
    }

    const contributedWeight = roundTo(quantity.times(unitWeight), QUANTITY_DECIMAL_PLACES);
    const remainingRequired = roundTo(
      matching.reduce((sum, bucket) => sum.plus(remaining.get(bucket.bucketKey) ?? 0), new Decimal(0)),
      QUANTITY_DECIMAL_PLACES
    );

    if (contributedWeight.gt(remainingRequired)) {
      return err(
        new ContributionRejectedError(
          'exceeds_limit',
          `Selected asset contribution exceeds required weight [${key.label}]: ${formatDecimal(contributedWeight)}g > ${formatDecimal(remainingRequired)}g`,
          context
        )
      );
    }

    let deductions: BucketDeduction[];
    const [onlyBucket] = matching;
    if (matching.length === 1 && onlyBucket) {
      const current = remaining.get(onlyBucket.bucketKey) ?? new Decimal(0);
      remaining.set(onlyBucket.bucketKey, current.minus(contributedWeight));
      deductions = [{ bucketKey: onlyBucket.bucketKey, weight: contributedWeight }];
    } else {
      deductions = deductGreedily(remaining, matching, contributedWeight);
    }

    contributions.push({ lotId: lot.id, quantity, contributedWeight, deductions });
    totalContributedWeight = totalContributedWeight.plus(contributedWeight);
  }

  const shortfalls: BucketShortfall[] = [];
  for (const bucket of requirements.values()) {
    const left = roundTo(remaining.get(bucket.bucketKey) ?? new Decimal(0), QUANTITY_DECIMAL_PLACES);
    if (left.gt(0)) {
      shortfalls.push({ label: bucket.label, remainingWeight: left });
    }
  }

  if (shortfalls.length > 0) {
    const summary = shortfalls.map((s) => `[${s.label}]: ${formatDecimal(s.remainingWeight)}g`).join(', ');
    return err(
      new ContributionRejectedError('insufficient_total', `Assets are not enough to meet the material requirements: ${summary}`, {
        additionalContext: {
          shortfalls: shortfalls.map((s) => ({ label: s.label, remainingWeight: s.remainingWeight.toFixed() })),
        },
      })
    );
  }

  logger.debug(
    { contributionCount: contributions.length, totalContributedWeight: totalContributedWeight.toFixed() },
    'Contributions validated'
  );

  return ok({ contributions, totalContributedWeight });
}
