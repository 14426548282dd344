import { RepositoryError, wrapError } from '@bullion-ledger/core';
import { BaseRepository, type KyselyDB } from '@bullion-ledger/data';
import { err, ok, type Result } from 'neverthrow';

import { transitionContribution } from '../domain/contribution-lifecycle.js';
import { ContributionSchema } from '../domain/schemas.js';
import type { Contribution, ContributionStatus } from '../domain/types.js';

import { toContributionRecord, toContributionRow } from './row-mappers.js';

export interface FindContributionOptions {
  includeDeleted?: boolean | undefined;
}

/**
 * Repository for lot contributions
 */
export class ContributionRepository extends BaseRepository {
  constructor(db: KyselyDB) {
    super(db, 'ContributionRepository');
  }

  async createContributions(contributions: readonly Contribution[]): Promise<Result<number, Error>> {
    try {
      if (contributions.length === 0) {
        return ok(0);
      }

      await this.db.insertInto('contributions').values(contributions.map(toContributionRow)).execute();

      this.logger.info({ count: contributions.length }, 'Created contributions');
      return ok(contributions.length);
    } catch (error) {
      this.logger.error({ error }, 'Failed to create contributions');
      return wrapError(error, 'Failed to create contributions');
    }
  }

  async findById(id: string, options: FindContributionOptions = {}): Promise<Result<Contribution | null, Error>> {
    try {
      let query = this.db.selectFrom('contributions').selectAll().where('id', '=', id);
      if (!options.includeDeleted) query = query.where('deleted_at', 'is', null);

      const row = await query.executeTakeFirst();
      if (!row) {
        return ok(null);
      }

      return this.parseWithSchema(toContributionRecord(row), ContributionSchema);
    } catch (error) {
      this.logger.error({ error, id }, 'Failed to find contribution by ID');
      return wrapError(error, 'Failed to find contribution');
    }
  }

  async findByLot(lotId: string, options: FindContributionOptions = {}): Promise<Result<Contribution[], Error>> {
    try {
      let query = this.db
        .selectFrom('contributions')
        .selectAll()
        .where('lot_id', '=', lotId)
        .orderBy('created_at', 'asc');
      if (!options.includeDeleted) query = query.where('deleted_at', 'is', null);

      const rows = await query.execute();
      return this.parseAllWithSchema(rows.map(toContributionRecord), ContributionSchema);
    } catch (error) {
      this.logger.error({ error, lotId }, 'Failed to find contributions by lot');
      return wrapError(error, 'Failed to find contributions by lot');
    }
  }

  /**
   * Move a contribution to a new status if the lifecycle allows it
   */
  async updateStatus(id: string, status: ContributionStatus): Promise<Result<Contribution, Error>> {
    const found = await this.findById(id);
    if (found.isErr()) {
      return err(found.error);
    }
    if (!found.value) {
      return err(new RepositoryError('NOT_FOUND', `Contribution ${id} not found`));
    }

    const transitioned = transitionContribution(found.value, status);
    if (transitioned.isErr()) {
      return err(transitioned.error);
    }

    try {
      await this.db
        .updateTable('contributions')
        .set({ status, updated_at: this.getCurrentDateTimeForDB() })
        .where('id', '=', id)
        .execute();

      this.logger.info({ contributionId: id, from: found.value.status, to: status }, 'Contribution status changed');
      return ok(transitioned.value);
    } catch (error) {
      this.logger.error({ error, id }, 'Failed to update contribution status');
      return wrapError(error, 'Failed to update contribution status');
    }
  }
}
