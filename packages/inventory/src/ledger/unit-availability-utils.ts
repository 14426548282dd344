import type { ContractStatus, InventoryUnit, LotLedger } from '../domain/types.js';

/**
 * Contract statuses that still hold their units
 */
export const ACTIVE_CONTRACT_STATUSES: readonly ContractStatus[] = ['active', 'renew', 'under_termination'];

export function isActiveContractStatus(status: ContractStatus | undefined): boolean {
  return status !== undefined && ACTIVE_CONTRACT_STATUSES.includes(status);
}

/**
 * Units held by an active contract, either through the unit's own contract
 * pointer or through any of its history rows
 */
export function findUnitsInActiveContracts(ledger: LotLedger): Set<string> {
  const held = new Set<string>();

  for (const unit of ledger.units) {
    if (unit.contractId && isActiveContractStatus(ledger.contractStatuses.get(unit.contractId))) {
      held.add(unit.id);
    }
  }

  for (const history of ledger.contractHistories) {
    if (isActiveContractStatus(ledger.contractStatuses.get(history.contractId))) {
      held.add(history.unitId);
    }
  }

  return held;
}

/**
 * Live units with no sale or pool pointer that no active contract holds
 */
export function findAvailableUnits(ledger: LotLedger): InventoryUnit[] {
  const held = findUnitsInActiveContracts(ledger);

  return ledger.units.filter((unit) => !unit.deletedAt && !unit.saleLotId && !unit.poolId && !held.has(unit.id));
}
