import { Decimal } from 'decimal.js';

import type { ProductionAllocation, UnitConsumption } from '../domain/types.js';

/**
 * Fold production allocations into per-unit consumed weight.
 *
 * Both allocation kinds resolve to a unit: direct allocations name it,
 * contract-history allocations carry the unit of the history row.
 */
export function summarizeProductionConsumption(
  allocations: readonly ProductionAllocation[]
): Map<string, UnitConsumption> {
  const consumption = new Map<string, UnitConsumption>();

  for (const allocation of allocations) {
    const unitId = allocation.source.unitId;
    const current = consumption.get(unitId) ?? {
      unitId,
      directWeight: new Decimal(0),
      contractHistoryWeight: new Decimal(0),
      allocationCount: 0,
    };

    consumption.set(
      unitId,
      allocation.source.kind === 'unit'
        ? {
            ...current,
            directWeight: current.directWeight.plus(allocation.weight),
            allocationCount: current.allocationCount + 1,
          }
        : {
            ...current,
            contractHistoryWeight: current.contractHistoryWeight.plus(allocation.weight),
            allocationCount: current.allocationCount + 1,
          }
    );
  }

  return consumption;
}

export function getConsumedWeight(consumption: UnitConsumption | undefined): Decimal {
  if (!consumption) {
    return new Decimal(0);
  }
  return consumption.directWeight.plus(consumption.contractHistoryWeight);
}

export function hasProductionAllocations(consumption: UnitConsumption | undefined): boolean {
  return (consumption?.allocationCount ?? 0) > 0;
}
