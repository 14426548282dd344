import type { RequirementMaterial } from '../domain/types.js';

const KEY_SEPARATOR = '|';
const MISSING_PART = '-';

export interface MaterialKey {
  /** What a contributed lot must match. Metal ignores carat here. */
  matchKey: string;
  /** Requirement bucket. Metal buckets are per carat. */
  bucketKey: string;
  /** Human-readable material name for messages */
  label: string;
}

function joinKey(...parts: (string | undefined)[]): string {
  return parts.map((part) => part ?? MISSING_PART).join(KEY_SEPARATOR);
}

export function isDiamond(material: RequirementMaterial): boolean {
  return material.materialItemName.trim().toLowerCase() === 'diamond';
}

/**
 * Requirement key of a material.
 *
 * Any carat of a metal satisfies a requirement for that metal, so the match
 * key drops the carat while the bucket key keeps it. Diamonds additionally
 * match on clarity and color.
 */
export function buildRequirementKey(material: RequirementMaterial): MaterialKey {
  const { materialItemId, materialItemName } = material;

  switch (material.materialType) {
    case 'metal': {
      const matchKey = joinKey('metal', materialItemId);
      return {
        matchKey,
        bucketKey: joinKey(matchKey, material.caratTypeId),
        label: `${materialItemName} - ${material.caratTypeId ?? 'any carat'}`,
      };
    }
    case 'stone': {
      const matchKey = isDiamond(material)
        ? joinKey('stone', materialItemId, material.shapeCutId, material.clarityId, material.colorId)
        : joinKey('stone', materialItemId, material.shapeCutId);
      return {
        matchKey,
        bucketKey: matchKey,
        label: `${materialItemName} - ${material.shapeCutId ?? 'any shape'}`,
      };
    }
    case 'other': {
      const matchKey = joinKey('other', materialItemId);
      return { matchKey, bucketKey: matchKey, label: materialItemName };
    }
  }
}
