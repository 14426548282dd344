/* eslint-disable unicorn/no-null -- null needed by Kysely */
import { RepositoryError, wrapError } from '@bullion-ledger/core';
import { BaseRepository, type KyselyDB } from '@bullion-ledger/data';
import { err, ok, type Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';

import { InventoryUnitSchema, PurchaseLotSchema } from '../domain/schemas.js';
import type { InventoryUnit, LotStatus, MaterialType, PurchaseLot } from '../domain/types.js';

import { toInventoryUnitRecord, toPurchaseLotRecord, toPurchaseLotRow } from './row-mappers.js';

export interface FindLotOptions {
  includeDeleted?: boolean | undefined;
}

export interface NewUnit {
  serialNumber: string;
  systemSerialNumber?: string | undefined;
}

/**
 * Where a unit is allocated. Setting a pointer clears the other two.
 */
export type UnitAllocationPointer =
  | { type: 'sale'; saleLotId: string }
  | { type: 'contract'; contractId: string }
  | { type: 'pool'; poolId: string }
  | { type: 'none' };

/**
 * Repository for lots and the units minted from them
 */
export class PurchaseLotRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'PurchaseLotRepository');
  }

  async createLot(lot: PurchaseLot): Promise<Result<string, Error>> {
    try {
      await this.db.insertInto('purchase_lots').values(toPurchaseLotRow(lot)).execute();

      this.logger.debug({ lotId: lot.id, requestType: lot.requestType }, 'Created lot');
      return ok(lot.id);
    } catch (error) {
      this.logger.error({ error, lotId: lot.id }, 'Failed to create lot');
      return wrapError(error, 'Failed to create lot');
    }
  }

  async findLotById(id: string, options: FindLotOptions = {}): Promise<Result<PurchaseLot | null, Error>> {
    try {
      let query = this.db.selectFrom('purchase_lots').selectAll().where('id', '=', id);
      if (!options.includeDeleted) query = query.where('deleted_at', 'is', null);

      const row = await query.executeTakeFirst();
      if (!row) {
        return ok(null);
      }

      return this.parseWithSchema(toPurchaseLotRecord(row), PurchaseLotSchema);
    } catch (error) {
      this.logger.error({ error, id }, 'Failed to find lot by ID');
      return wrapError(error, 'Failed to find lot');
    }
  }

  /**
   * Ids of approved or completed purchase lots of a material item, oldest first
   */
  async findAllocatableLotIds(materialType: MaterialType, materialItemId: string): Promise<Result<string[], Error>> {
    try {
      const rows = await this.db
        .selectFrom('purchase_lots')
        .select('id')
        .where('request_type', '=', 'purchase')
        .where('material_type', '=', materialType)
        .where('material_item_id', '=', materialItemId)
        .where((eb) => eb.or([eb('status', '=', 'approved'), eb('status', '=', 'completed')]))
        .where('deleted_at', 'is', null)
        .orderBy('created_at', 'asc')
        .execute();

      return ok(rows.map((row) => row.id));
    } catch (error) {
      this.logger.error({ error, materialType, materialItemId }, 'Failed to find allocatable lots');
      return wrapError(error, 'Failed to find allocatable lots');
    }
  }

  async updateLotStatus(id: string, status: LotStatus): Promise<Result<boolean, Error>> {
    try {
      const result = await this.db
        .updateTable('purchase_lots')
        .set({ status, updated_at: this.getCurrentDateTimeForDB() })
        .where('id', '=', id)
        .executeTakeFirst();

      const updated = Number(result.numUpdatedRows) > 0;
      this.logger.debug({ lotId: id, status, updated }, 'Updated lot status');
      return ok(updated);
    } catch (error) {
      this.logger.error({ error, id }, 'Failed to update lot status');
      return wrapError(error, 'Failed to update lot status');
    }
  }

  /**
   * Mint serialized units for a lot in one insert
   */
  async mintUnits(lotId: string, units: readonly NewUnit[]): Promise<Result<InventoryUnit[], Error>> {
    try {
      if (units.length === 0) {
        return ok([]);
      }

      const createdAt = this.getCurrentDateTimeForDB();
      const rows = units.map((unit) => ({
        id: uuidv4(),
        lot_id: lotId,
        serial_number: unit.serialNumber,
        system_serial_number: unit.systemSerialNumber ?? null,
        sale_lot_id: null,
        contract_id: null,
        pool_id: null,
        created_at: createdAt,
        updated_at: null,
        deleted_at: null,
      }));

      const inserted = await this.db.insertInto('inventory_units').values(rows).returningAll().execute();

      this.logger.info({ lotId, count: inserted.length }, 'Minted units');
      return this.parseAllWithSchema(inserted.map(toInventoryUnitRecord), InventoryUnitSchema);
    } catch (error) {
      this.logger.error({ error, lotId }, 'Failed to mint units');
      return wrapError(error, 'Failed to mint units');
    }
  }

  /**
   * Point units at a sale lot, contract or pool, or clear their allocation
   */
  async setUnitAllocation(unitIds: readonly string[], pointer: UnitAllocationPointer): Promise<Result<number, Error>> {
    try {
      if (unitIds.length === 0) {
        return ok(0);
      }

      const result = await this.db
        .updateTable('inventory_units')
        .set({
          sale_lot_id: pointer.type === 'sale' ? pointer.saleLotId : null,
          contract_id: pointer.type === 'contract' ? pointer.contractId : null,
          pool_id: pointer.type === 'pool' ? pointer.poolId : null,
          updated_at: this.getCurrentDateTimeForDB(),
        })
        .where('id', 'in', [...unitIds])
        .executeTakeFirst();

      const updated = Number(result.numUpdatedRows);
      if (updated !== unitIds.length) {
        return err(
          new RepositoryError('NOT_FOUND', `Expected to update ${unitIds.length} units, updated ${updated}`, {
            additionalContext: { unitIds },
          })
        );
      }

      this.logger.debug({ count: updated, pointer: pointer.type }, 'Set unit allocation');
      return ok(updated);
    } catch (error) {
      this.logger.error({ error }, 'Failed to set unit allocation');
      return wrapError(error, 'Failed to set unit allocation');
    }
  }

  async softDeleteUnit(unitId: string): Promise<Result<boolean, Error>> {
    try {
      const result = await this.db
        .updateTable('inventory_units')
        .set({ deleted_at: this.getCurrentDateTimeForDB() })
        .where('id', '=', unitId)
        .where('deleted_at', 'is', null)
        .executeTakeFirst();

      return ok(Number(result.numUpdatedRows) > 0);
    } catch (error) {
      this.logger.error({ error, unitId }, 'Failed to soft-delete unit');
      return wrapError(error, 'Failed to soft-delete unit');
    }
  }
}
