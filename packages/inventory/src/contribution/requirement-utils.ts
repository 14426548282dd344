import { QUANTITY_DECIMAL_PLACES, roundTo } from '@bullion-ledger/core';
import { Decimal } from 'decimal.js';

import type { RequirementMaterial } from '../domain/types.js';

import { buildRequirementKey } from './material-key-utils.js';

/**
 * One material line of a jewelry product in a design
 */
export interface MaterialRequirementLine {
  material: RequirementMaterial;
  /** Grams per product, or per stone for stones */
  weight: Decimal;
  /** Stones per product; defaults to 1 */
  stoneQuantity?: Decimal | undefined;
  /** Products ordered */
  productQuantity: Decimal;
}

export interface RequirementBucket {
  bucketKey: string;
  matchKey: string;
  label: string;
  requiredWeight: Decimal;
}

/** Keyed by bucket key, in first-seen order */
export type MaterialRequirements = ReadonlyMap<string, RequirementBucket>;

export function calculateLineRequiredWeight(line: MaterialRequirementLine): Decimal {
  if (line.material.materialType === 'stone') {
    return (line.stoneQuantity ?? new Decimal(1)).times(line.productQuantity).times(line.weight);
  }
  return line.weight.times(line.productQuantity);
}

/**
 * Aggregate required grams per requirement bucket
 */
export function buildMaterialRequirements(lines: readonly MaterialRequirementLine[]): Map<string, RequirementBucket> {
  const buckets = new Map<string, RequirementBucket>();

  for (const line of lines) {
    const key = buildRequirementKey(line.material);
    const existing = buckets.get(key.bucketKey);
    const requiredWeight = calculateLineRequiredWeight(line);

    buckets.set(key.bucketKey, {
      bucketKey: key.bucketKey,
      matchKey: key.matchKey,
      label: key.label,
      requiredWeight: existing ? existing.requiredWeight.plus(requiredWeight) : requiredWeight,
    });
  }

  for (const bucket of buckets.values()) {
    bucket.requiredWeight = roundTo(bucket.requiredWeight, QUANTITY_DECIMAL_PLACES);
  }

  return buckets;
}
