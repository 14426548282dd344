/* eslint-disable unicorn/no-null -- null needed by Kysely */
import { wrapError } from '@bullion-ledger/core';
import { BaseRepository, type KyselyDB } from '@bullion-ledger/data';
import { ok, type Result } from 'neverthrow';

import type { Contract, ContractStatus, ContractUnitHistory, ProductionAllocation } from '../domain/types.js';

/**
 * Repository for contracts, their unit history and production consumption
 */
export class ContractRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'ContractRepository');
  }

  /**
   * Insert a contract or update the status of an existing one
   */
  async saveContract(contract: Contract): Promise<Result<string, Error>> {
    try {
      const now = this.getCurrentDateTimeForDB();
      await this.db
        .insertInto('contracts')
        .values({ id: contract.id, status: contract.status, created_at: now, updated_at: null, deleted_at: null })
        .onConflict((oc) => oc.column('id').doUpdateSet({ status: contract.status, updated_at: now }))
        .execute();

      this.logger.debug({ contractId: contract.id, status: contract.status }, 'Saved contract');
      return ok(contract.id);
    } catch (error) {
      this.logger.error({ error, contractId: contract.id }, 'Failed to save contract');
      return wrapError(error, 'Failed to save contract');
    }
  }

  async updateContractStatus(id: string, status: ContractStatus): Promise<Result<boolean, Error>> {
    try {
      const result = await this.db
        .updateTable('contracts')
        .set({ status, updated_at: this.getCurrentDateTimeForDB() })
        .where('id', '=', id)
        .executeTakeFirst();

      return ok(Number(result.numUpdatedRows) > 0);
    } catch (error) {
      this.logger.error({ error, id }, 'Failed to update contract status');
      return wrapError(error, 'Failed to update contract status');
    }
  }

  /**
   * Append a unit → contract history row
   */
  async recordUnitHistory(history: ContractUnitHistory): Promise<Result<string, Error>> {
    try {
      await this.db
        .insertInto('contract_unit_histories')
        .values({
          id: history.id,
          unit_id: history.unitId,
          contract_id: history.contractId,
          contributed_weight: this.toDecimalString(history.contributedWeight),
          created_at: history.createdAt.toISOString(),
          deleted_at: null,
        })
        .execute();

      return ok(history.id);
    } catch (error) {
      this.logger.error({ error, historyId: history.id }, 'Failed to record unit history');
      return wrapError(error, 'Failed to record unit history');
    }
  }

  async recordProductionAllocation(allocation: ProductionAllocation): Promise<Result<string, Error>> {
    try {
      await this.db
        .insertInto('production_allocations')
        .values({
          id: allocation.id,
          production_payment_id: allocation.productionPaymentId,
          unit_id: allocation.source.kind === 'unit' ? allocation.source.unitId : null,
          contract_unit_history_id: allocation.source.kind === 'contract_history' ? allocation.source.historyId : null,
          contract_id: allocation.contractId ?? null,
          weight: this.toDecimalString(allocation.weight),
          created_at: this.getCurrentDateTimeForDB(),
          deleted_at: null,
        })
        .execute();

      this.logger.debug(
        { allocationId: allocation.id, source: allocation.source.kind, weight: allocation.weight.toFixed() },
        'Recorded production allocation'
      );
      return ok(allocation.id);
    } catch (error) {
      this.logger.error({ error, allocationId: allocation.id }, 'Failed to record production allocation');
      return wrapError(error, 'Failed to record production allocation');
    }
  }
}
