// Domain
export * from './domain/schemas.js';
export type { LotLedger, RequirementMaterial, UnitConsumption } from './domain/types.js';
export { createLotLedger } from './domain/lot-ledger.js';
export {
  CONTRIBUTION_STATUS_TRANSITIONS,
  isValidContributionTransition,
  transitionContribution,
} from './domain/contribution-lifecycle.js';

// Unit ledger
export {
  getConsumedWeight,
  hasProductionAllocations,
  summarizeProductionConsumption,
} from './ledger/production-consumption-utils.js';
export { calculateUnitRemainingWeight, getUnitRemainingWeight } from './ledger/unit-weight-utils.js';
export {
  ACTIVE_CONTRACT_STATUSES,
  findAvailableUnits,
  findUnitsInActiveContracts,
  isActiveContractStatus,
} from './ledger/unit-availability-utils.js';

// Reconciliation
export {
  DEFAULT_RECONCILIATION_CONFIG,
  loadReconciliationConfig,
  type ReconciliationConfig,
} from './reconciliation/reconciliation-config.js';
export { ReconciliationError, type ReconciliationFailureReason } from './reconciliation/errors.js';
export {
  ALLOCATING_SALE_STATUSES,
  COUNTED_CONTRIBUTION_STATUSES,
  calculateContributedQuantity,
  calculateRemainingQuantity,
  calculateRemainingWeight,
  calculateTotalContributed,
  calculateTotalSold,
} from './reconciliation/remaining-quantity-utils.js';
export {
  calculateContributionUsage,
  getContributionUsageOrDefault,
  type ContributionUsage,
} from './reconciliation/contribution-usage-utils.js';
export { reconcileLot, type LotReconciliation } from './reconciliation/lot-reconciler.js';

// Contributions
export { buildRequirementKey, isDiamond, type MaterialKey } from './contribution/material-key-utils.js';
export {
  buildMaterialRequirements,
  calculateLineRequiredWeight,
  type MaterialRequirementLine,
  type MaterialRequirements,
  type RequirementBucket,
} from './contribution/requirement-utils.js';
export { ContributionRejectedError, type ContributionRejectionReason } from './contribution/errors.js';
export {
  ALLOCATABLE_LOT_STATUSES,
  validateContributions,
  type AcceptedContribution,
  type BucketDeduction,
  type ContributionProposal,
  type ContributionValidation,
} from './contribution/contribution-validator.js';
export {
  isFulfillmentPossible,
  lotMatchesRequirement,
  planAutomaticContributions,
  type AutomaticContributionPlan,
  type RequirementShortfall,
} from './contribution/automatic-allocation.js';

// Sales
export {
  SELLABLE_LOT_STATUSES,
  SaleRejectedError,
  validateSaleQuantity,
  type SaleRejectionReason,
} from './sales/sale-eligibility.js';

// Persistence
export { LotLedgerRepository, type LoadLotLedgerOptions } from './persistence/lot-ledger-repository.js';
export {
  PurchaseLotRepository,
  type FindLotOptions,
  type NewUnit,
  type UnitAllocationPointer,
} from './persistence/purchase-lot-repository.js';
export { ContractRepository } from './persistence/contract-repository.js';
export { ContributionRepository, type FindContributionOptions } from './persistence/contribution-repository.js';

// Services
export {
  AllocationCommitService,
  type CommitAutomaticContributionsRequest,
  type CommitContributionsRequest,
  type CommittedContributions,
  type RequestedContribution,
} from './services/allocation-commit-service.js';
export { LotQueryService } from './services/lot-query-service.js';
