/* eslint-disable unicorn/no-null -- null needed by Kysely */
import { DecimalStringSchema } from '@bullion-ledger/core';
import type {
  ContractsTable,
  ContractUnitHistoriesTable,
  ContributionsTable,
  InventoryUnitsTable,
  PurchaseLotsTable,
} from '@bullion-ledger/data';
import type { Insertable, Selectable } from 'kysely';

import type { Contribution, ContributionTarget, PurchaseLot } from '../domain/types.js';

/**
 * Row → domain-shaped records. Output is unvalidated; repositories run it
 * through the domain schemas.
 */

function optional<T>(value: T | null): T | undefined {
  return value ?? undefined;
}

function optionalDecimal(value: string | null) {
  return value === null ? undefined : DecimalStringSchema.parse(value);
}

export function toPurchaseLotRecord(row: Selectable<PurchaseLotsTable>) {
  return {
    id: row.id,
    businessId: optional(row.business_id),
    requestType: row.request_type,
    status: row.status,
    requestedQuantity: DecimalStringSchema.parse(row.requested_quantity),
    material: {
      materialType: row.material_type,
      materialItemId: row.material_item_id,
      materialItemName: row.material_item_name,
      caratTypeId: optional(row.carat_type_id),
      shapeCutId: optional(row.shape_cut_id),
      clarityId: optional(row.clarity_id),
      colorId: optional(row.color_id),
      unitWeight: optionalDecimal(row.unit_weight),
    },
    relatedLotId: optional(row.related_lot_id),
    createdAt: row.created_at,
    deletedAt: optional(row.deleted_at),
  };
}

export function toPurchaseLotRow(lot: PurchaseLot): Insertable<PurchaseLotsTable> {
  return {
    id: lot.id,
    business_id: lot.businessId ?? null,
    request_type: lot.requestType,
    status: lot.status,
    requested_quantity: lot.requestedQuantity.toFixed(),
    material_type: lot.material.materialType,
    material_item_id: lot.material.materialItemId,
    material_item_name: lot.material.materialItemName,
    carat_type_id: lot.material.caratTypeId ?? null,
    shape_cut_id: lot.material.shapeCutId ?? null,
    clarity_id: lot.material.clarityId ?? null,
    color_id: lot.material.colorId ?? null,
    unit_weight: lot.material.unitWeight?.toFixed() ?? null,
    related_lot_id: lot.relatedLotId ?? null,
    created_at: lot.createdAt.toISOString(),
    updated_at: null,
    deleted_at: lot.deletedAt?.toISOString() ?? null,
  };
}

export function toInventoryUnitRecord(row: Selectable<InventoryUnitsTable>) {
  return {
    id: row.id,
    lotId: row.lot_id,
    serialNumber: row.serial_number,
    systemSerialNumber: optional(row.system_serial_number),
    saleLotId: optional(row.sale_lot_id),
    contractId: optional(row.contract_id),
    poolId: optional(row.pool_id),
    deletedAt: optional(row.deleted_at),
  };
}

export function toContractRecord(row: Selectable<ContractsTable>) {
  return { id: row.id, status: row.status };
}

export function toContractUnitHistoryRecord(row: Selectable<ContractUnitHistoriesTable>) {
  return {
    id: row.id,
    unitId: row.unit_id,
    contractId: row.contract_id,
    contributedWeight: DecimalStringSchema.parse(row.contributed_weight),
    createdAt: row.created_at,
  };
}

export interface StoredProductionAllocation {
  id: string;
  production_payment_id: string;
  unit_id: string | null;
  contract_unit_history_id: string | null;
  history_unit_id: string | null;
  contract_id: string | null;
  weight: string;
}

export function toProductionAllocationRecord(row: StoredProductionAllocation) {
  return {
    id: row.id,
    productionPaymentId: row.production_payment_id,
    source:
      row.unit_id !== null
        ? { kind: 'unit', unitId: row.unit_id }
        : { kind: 'contract_history', historyId: row.contract_unit_history_id, unitId: row.history_unit_id },
    contractId: optional(row.contract_id),
    weight: DecimalStringSchema.parse(row.weight),
  };
}

function toContributionTargetRecord(row: Selectable<ContributionsTable>) {
  switch (row.contribution_type) {
    case 'pool':
      return { type: 'pool', poolId: row.pool_id };
    case 'contract':
      return { type: 'contract', contractId: row.contract_id };
    case 'production_payment':
      return { type: 'production_payment', productionPaymentId: row.production_payment_id };
  }
}

export function toContributionRecord(row: Selectable<ContributionsTable>) {
  return {
    id: row.id,
    lotId: row.lot_id,
    quantity: DecimalStringSchema.parse(row.quantity),
    status: row.status,
    target: toContributionTargetRecord(row),
    createdAt: row.created_at,
    deletedAt: optional(row.deleted_at),
  };
}

function toTargetColumns(target: ContributionTarget) {
  return {
    contribution_type: target.type,
    pool_id: target.type === 'pool' ? target.poolId : null,
    contract_id: target.type === 'contract' ? target.contractId : null,
    production_payment_id: target.type === 'production_payment' ? target.productionPaymentId : null,
  };
}

export function toContributionRow(contribution: Contribution): Insertable<ContributionsTable> {
  return {
    id: contribution.id,
    lot_id: contribution.lotId,
    quantity: contribution.quantity.toFixed(),
    ...toTargetColumns(contribution.target),
    status: contribution.status,
    created_at: contribution.createdAt.toISOString(),
    updated_at: null,
    deleted_at: contribution.deletedAt?.toISOString() ?? null,
  };
}
