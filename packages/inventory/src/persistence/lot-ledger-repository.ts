import { wrapError } from '@bullion-ledger/core';
import { BaseRepository, type KyselyDB } from '@bullion-ledger/data';
import { err, ok, type Result } from 'neverthrow';

import { createLotLedger } from '../domain/lot-ledger.js';
import {
  ContractSchema,
  ContractUnitHistorySchema,
  ContributionSchema,
  InventoryUnitSchema,
  ProductionAllocationSchema,
  PurchaseLotSchema,
} from '../domain/schemas.js';
import type { ContractStatus, LotLedger } from '../domain/types.js';
import { summarizeProductionConsumption } from '../ledger/production-consumption-utils.js';

import {
  toContractRecord,
  toContractUnitHistoryRecord,
  toContributionRecord,
  toInventoryUnitRecord,
  toProductionAllocationRecord,
  toPurchaseLotRecord,
} from './row-mappers.js';

export interface LoadLotLedgerOptions {
  /** Include soft-deleted rows. Off by default. */
  includeDeleted?: boolean | undefined;
}

/**
 * Loads everything the reconciliation engine needs for a lot, one query per
 * relation regardless of how many units the lot has
 */
export class LotLedgerRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'LotLedgerRepository');
  }

  async loadLotLedger(lotId: string, options: LoadLotLedgerOptions = {}): Promise<Result<LotLedger | null, Error>> {
    const includeDeleted = options.includeDeleted ?? false;

    try {
      let lotQuery = this.db.selectFrom('purchase_lots').selectAll().where('id', '=', lotId);
      if (!includeDeleted) lotQuery = lotQuery.where('deleted_at', 'is', null);
      const lotRow = await lotQuery.executeTakeFirst();

      if (!lotRow) {
        return ok(null);
      }

      let saleLotQuery = this.db
        .selectFrom('purchase_lots')
        .selectAll()
        .where('related_lot_id', '=', lotId)
        .where('request_type', '=', 'sale');
      if (!includeDeleted) saleLotQuery = saleLotQuery.where('deleted_at', 'is', null);

      let unitQuery = this.db
        .selectFrom('inventory_units')
        .selectAll()
        .where('lot_id', '=', lotId)
        .orderBy('serial_number', 'asc');
      if (!includeDeleted) unitQuery = unitQuery.where('deleted_at', 'is', null);

      let contributionQuery = this.db
        .selectFrom('contributions')
        .selectAll()
        .where('lot_id', '=', lotId)
        .orderBy('created_at', 'asc');
      if (!includeDeleted) contributionQuery = contributionQuery.where('deleted_at', 'is', null);

      let historyQuery = this.db
        .selectFrom('contract_unit_histories as h')
        .innerJoin('inventory_units as u', 'u.id', 'h.unit_id')
        .selectAll('h')
        .where('u.lot_id', '=', lotId);
      if (!includeDeleted) historyQuery = historyQuery.where('h.deleted_at', 'is', null);

      let allocationQuery = this.db
        .selectFrom('production_allocations as pa')
        .leftJoin('contract_unit_histories as h', 'h.id', 'pa.contract_unit_history_id')
        .leftJoin('inventory_units as du', 'du.id', 'pa.unit_id')
        .leftJoin('inventory_units as hu', 'hu.id', 'h.unit_id')
        .select([
          'pa.id',
          'pa.production_payment_id',
          'pa.unit_id',
          'pa.contract_unit_history_id',
          'pa.contract_id',
          'pa.weight',
          'h.unit_id as history_unit_id',
        ])
        .where((eb) => eb.or([eb('du.lot_id', '=', lotId), eb('hu.lot_id', '=', lotId)]));
      if (!includeDeleted) allocationQuery = allocationQuery.where('pa.deleted_at', 'is', null);

      const saleLotRows = await saleLotQuery.execute();
      const unitRows = await unitQuery.execute();
      const contributionRows = await contributionQuery.execute();
      const historyRows = await historyQuery.execute();
      const allocationRows = await allocationQuery.execute();

      const contractIds = new Set<string>();
      for (const row of unitRows) {
        if (row.contract_id) contractIds.add(row.contract_id);
      }
      for (const row of historyRows) {
        contractIds.add(row.contract_id);
      }

      const contractRows = contractIds.size > 0 ? await this.findContractRows([...contractIds]) : [];

      const lot = this.parseWithSchema(toPurchaseLotRecord(lotRow), PurchaseLotSchema);
      if (lot.isErr()) return err(lot.error);

      const saleLots = this.parseAllWithSchema(saleLotRows.map(toPurchaseLotRecord), PurchaseLotSchema);
      if (saleLots.isErr()) return err(saleLots.error);

      const units = this.parseAllWithSchema(unitRows.map(toInventoryUnitRecord), InventoryUnitSchema);
      if (units.isErr()) return err(units.error);

      const contributions = this.parseAllWithSchema(contributionRows.map(toContributionRecord), ContributionSchema);
      if (contributions.isErr()) return err(contributions.error);

      const histories = this.parseAllWithSchema(historyRows.map(toContractUnitHistoryRecord), ContractUnitHistorySchema);
      if (histories.isErr()) return err(histories.error);

      const allocations = this.parseAllWithSchema(
        allocationRows.map(toProductionAllocationRecord),
        ProductionAllocationSchema
      );
      if (allocations.isErr()) return err(allocations.error);

      const contracts = this.parseAllWithSchema(contractRows.map(toContractRecord), ContractSchema);
      if (contracts.isErr()) return err(contracts.error);

      const contractStatuses = new Map<string, ContractStatus>();
      for (const contract of contracts.value) {
        contractStatuses.set(contract.id, contract.status);
      }

      this.logger.debug(
        {
          lotId,
          includeDeleted,
          units: units.value.length,
          contributions: contributions.value.length,
          allocations: allocations.value.length,
        },
        'Loaded lot ledger'
      );

      return ok(
        createLotLedger(lot.value, {
          saleLots: saleLots.value,
          units: units.value,
          contributions: contributions.value,
          contractHistories: histories.value,
          contractStatuses,
          consumption: summarizeProductionConsumption(allocations.value),
        })
      );
    } catch (error) {
      this.logger.error({ error, lotId }, 'Failed to load lot ledger');
      return wrapError(error, 'Failed to load lot ledger');
    }
  }

  // Statuses of soft-deleted contracts still count: deleting a contract does not release its units
  private async findContractRows(contractIds: string[]) {
    return this.db.selectFrom('contracts').selectAll().where('id', 'in', contractIds).execute();
  }
}
