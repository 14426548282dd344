import type { Decimal } from 'decimal.js';

import type {
  Contribution,
  ContractStatus,
  ContractUnitHistory,
  InventoryUnit,
  MaterialSpec,
  PurchaseLot,
} from './schemas.js';

export type {
  Contract,
  ContractStatus,
  ContractUnitHistory,
  Contribution,
  ContributionStatus,
  ContributionTarget,
  InventoryUnit,
  LotRequestType,
  LotStatus,
  MaterialSpec,
  MaterialType,
  ProductionAllocation,
  ProductionAllocationSource,
  PurchaseLot,
} from './schemas.js';

/**
 * Production weight consumed from one unit, split by how it was consumed
 */
export interface UnitConsumption {
  unitId: string;
  /** Allocations pointing straight at the unit */
  directWeight: Decimal;
  /** Allocations pointing at one of the unit's contract history rows */
  contractHistoryWeight: Decimal;
  allocationCount: number;
}

/**
 * Everything the reconciliation engine reads for one lot, fetched up front.
 */
export interface LotLedger {
  lot: PurchaseLot;
  /** Sale lots whose relatedLotId is this lot */
  saleLots: readonly PurchaseLot[];
  units: readonly InventoryUnit[];
  contributions: readonly Contribution[];
  /** History rows of this lot's units */
  contractHistories: readonly ContractUnitHistory[];
  /** Status of every contract referenced by a unit pointer or a history row */
  contractStatuses: ReadonlyMap<string, ContractStatus>;
  /** Keyed by unit id; units without production allocations are absent */
  consumption: ReadonlyMap<string, UnitConsumption>;
}

/**
 * Requirement-side material description (no per-unit weight)
 */
export type RequirementMaterial = Omit<MaterialSpec, 'unitWeight'>;
