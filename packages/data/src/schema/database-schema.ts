import type { ColumnType } from 'kysely';

/**
 * Database schema definitions
 *
 * Quantities and weights are TEXT so decimal precision survives the round trip.
 * Every table is soft-deleted through `deleted_at`.
 */

export type DecimalString = ColumnType<string, string, string>;
export type DateTime = ColumnType<string, string, string>; // ISO 8601 strings

export type LotRequestType = 'purchase' | 'sale' | 'jewelry_design';

export type LotStatusValue =
  | 'pending'
  | 'approved'
  | 'completed'
  | 'confirmed'
  | 'rejected'
  | 'pending_seller_price'
  | 'pending_investor_confirmation';

export type MaterialTypeValue = 'metal' | 'stone' | 'other';

export type ContractStatusValue =
  | 'not_assigned'
  | 'active'
  | 'completed'
  | 'terminated'
  | 'renew'
  | 'closed'
  | 'under_termination';

export type ContributionTypeValue = 'pool' | 'contract' | 'production_payment';

export type ContributionStatusValue = 'pending' | 'admin_approved' | 'approved' | 'terminated' | 'rejected';

/**
 * Co-ownership contracts; only the status matters to reconciliation
 */
export interface ContractsTable {
  id: string;
  status: ContractStatusValue;
  created_at: DateTime;
  updated_at: DateTime | null;
  deleted_at: DateTime | null;
}

/**
 * Purchase, sale and jewelry-design lots
 */
export interface PurchaseLotsTable {
  id: string;
  business_id: string | null;
  request_type: LotRequestType;
  status: LotStatusValue;
  requested_quantity: DecimalString;

  // Material record of the lot's precious item
  material_type: MaterialTypeValue;
  material_item_id: string;
  material_item_name: string;
  carat_type_id: string | null;
  shape_cut_id: string | null;
  clarity_id: string | null;
  color_id: string | null;
  unit_weight: DecimalString | null;

  // A sale lot points at the purchase lot it sells from
  related_lot_id: string | null;

  created_at: DateTime;
  updated_at: DateTime | null;
  deleted_at: DateTime | null;
}

/**
 * Serialized units minted from a lot. At most one allocation pointer is set.
 */
export interface InventoryUnitsTable {
  id: string;
  lot_id: string;
  serial_number: string;
  system_serial_number: string | null;
  sale_lot_id: string | null;
  contract_id: string | null;
  pool_id: string | null;
  created_at: DateTime;
  updated_at: DateTime | null;
  deleted_at: DateTime | null;
}

/**
 * Append-only unit → contract links
 */
export interface ContractUnitHistoriesTable {
  id: string;
  unit_id: string;
  contract_id: string;
  contributed_weight: DecimalString;
  created_at: DateTime;
  deleted_at: DateTime | null;
}

/**
 * Weight consumed from a unit by production, directly or through a contract history row
 */
export interface ProductionAllocationsTable {
  id: string;
  production_payment_id: string;
  unit_id: string | null;
  contract_unit_history_id: string | null;
  contract_id: string | null;
  weight: DecimalString;
  created_at: DateTime;
  deleted_at: DateTime | null;
}

export interface ContributionsTable {
  id: string;
  lot_id: string;
  quantity: DecimalString;
  contribution_type: ContributionTypeValue;
  pool_id: string | null;
  contract_id: string | null;
  production_payment_id: string | null;
  status: ContributionStatusValue;
  created_at: DateTime;
  updated_at: DateTime | null;
  deleted_at: DateTime | null;
}

export interface DatabaseSchema {
  contracts: ContractsTable;
  purchase_lots: PurchaseLotsTable;
  inventory_units: InventoryUnitsTable;
  contract_unit_histories: ContractUnitHistoriesTable;
  production_allocations: ProductionAllocationsTable;
  contributions: ContributionsTable;
}
