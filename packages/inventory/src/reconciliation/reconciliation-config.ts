import { getTerminatedStoneUsagePolicy, type TerminatedStoneUsagePolicy } from '@bullion-ledger/env';

export interface ReconciliationConfig {
  /**
   * How much of a terminated stone contribution stays allocated.
   * `full_quantity` keeps all of it; `allocated_units` keeps only the units
   * production consumed.
   */
  terminatedStoneUsage: TerminatedStoneUsagePolicy;
}

export const DEFAULT_RECONCILIATION_CONFIG: ReconciliationConfig = {
  terminatedStoneUsage: 'full_quantity',
};

/**
 * Reconciliation settings from the validated environment
 */
export function loadReconciliationConfig(): ReconciliationConfig {
  return {
    terminatedStoneUsage: getTerminatedStoneUsagePolicy(),
  };
}
