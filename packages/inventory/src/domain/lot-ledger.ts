import type { LotLedger, PurchaseLot } from './types.js';

/**
 * Assemble a ledger, defaulting every collection to empty
 */
export function createLotLedger(lot: PurchaseLot, parts: Partial<Omit<LotLedger, 'lot'>> = {}): LotLedger {
  return {
    lot,
    saleLots: parts.saleLots ?? [],
    units: parts.units ?? [],
    contributions: parts.contributions ?? [],
    contractHistories: parts.contractHistories ?? [],
    contractStatuses: parts.contractStatuses ?? new Map(),
    consumption: parts.consumption ?? new Map(),
  };
}
