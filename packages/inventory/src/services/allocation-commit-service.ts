import { RepositoryError, wrapError } from '@bullion-ledger/core';
import type { KyselyDB } from '@bullion-ledger/data';
import { getLogger } from '@bullion-ledger/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';

import { planAutomaticContributions } from '../contribution/automatic-allocation.js';
import {
  validateContributions,
  type ContributionProposal,
  type ContributionValidation,
} from '../contribution/contribution-validator.js';
import { ContributionRejectedError } from '../contribution/errors.js';
import { buildRequirementKey } from '../contribution/material-key-utils.js';
import {
  buildMaterialRequirements,
  type MaterialRequirementLine,
  type MaterialRequirements,
} from '../contribution/requirement-utils.js';
import type { Contribution, ContributionTarget, LotLedger } from '../domain/types.js';
import { ContributionRepository } from '../persistence/contribution-repository.js';
import { LotLedgerRepository } from '../persistence/lot-ledger-repository.js';
import { PurchaseLotRepository } from '../persistence/purchase-lot-repository.js';
import { loadReconciliationConfig, type ReconciliationConfig } from '../reconciliation/reconciliation-config.js';

const logger = getLogger('AllocationCommitService');

export interface RequestedContribution {
  lotId: string;
  quantity: Decimal;
}

export interface CommitContributionsRequest {
  target: ContributionTarget;
  requirements: MaterialRequirements;
  contributions: readonly RequestedContribution[];
}

export interface CommitAutomaticContributionsRequest {
  target: ContributionTarget;
  lines: readonly MaterialRequirementLine[];
}

export interface CommittedContributions {
  contributions: Contribution[];
  validation: ContributionValidation;
}

/**
 * Validates and records contributions against the current state of their lots.
 *
 * The ledger read, the validation and the insert share one transaction, so a
 * second commit against the same lot only sees capacity after the first one
 * has been written.
 */
export class AllocationCommitService {
  constructor(
    private readonly db: KyselyDB,
    private readonly config: ReconciliationConfig = loadReconciliationConfig()
  ) {}

  async commit(request: CommitContributionsRequest): Promise<Result<CommittedContributions, Error>> {
    try {
      return await this.db.transaction().execute(async (trx): Promise<Result<CommittedContributions, Error>> => {
        const ledgers = await this.loadLedgers(
          trx,
          request.contributions.map((contribution) => contribution.lotId)
        );
        if (ledgers.isErr()) {
          return err(ledgers.error);
        }

        const proposals: ContributionProposal[] = [];
        for (const contribution of request.contributions) {
          const ledger = ledgers.value.get(contribution.lotId);
          if (!ledger) {
            return err(new RepositoryError('NOT_FOUND', `Lot ${contribution.lotId} not found`));
          }
          proposals.push({ ledger, quantity: contribution.quantity });
        }

        return this.validateAndInsert(trx, request.target, request.requirements, proposals);
      });
    } catch (error) {
      logger.error({ error }, 'Failed to commit contributions');
      return wrapError(error, 'Failed to commit contributions');
    }
  }

  /**
   * Select whole units from matching lots to cover the lines, then commit them
   */
  async commitAutomatic(
    request: CommitAutomaticContributionsRequest
  ): Promise<Result<CommittedContributions, Error>> {
    try {
      return await this.db.transaction().execute(async (trx): Promise<Result<CommittedContributions, Error>> => {
        const lotRepository = new PurchaseLotRepository(trx);
        const lotIds: string[] = [];

        for (const line of request.lines) {
          const found = await lotRepository.findAllocatableLotIds(
            line.material.materialType,
            line.material.materialItemId
          );
          if (found.isErr()) {
            return err(found.error);
          }
          lotIds.push(...found.value);
        }

        const ledgers = await this.loadLedgers(trx, lotIds);
        if (ledgers.isErr()) {
          return err(ledgers.error);
        }

        const plan = planAutomaticContributions(request.lines, [...ledgers.value.values()], this.config);
        if (plan.shortfalls.length > 0) {
          const summary = plan.shortfalls
            .map((shortfall) => `[${shortfall.label}]: ${shortfall.remainingWeight.toFixed()}g`)
            .join(', ');
          return err(
            new ContributionRejectedError(
              'insufficient_total',
              `Assets are not enough to meet the material requirements: ${summary}`
            )
          );
        }

        logger.debug(
          { lines: request.lines.map((line) => buildRequirementKey(line.material).label), lots: plan.proposals.length },
          'Planned automatic contributions'
        );

        return this.validateAndInsert(trx, request.target, buildMaterialRequirements(request.lines), plan.proposals);
      });
    } catch (error) {
      logger.error({ error }, 'Failed to commit automatic contributions');
      return wrapError(error, 'Failed to commit automatic contributions');
    }
  }

  private async loadLedgers(db: KyselyDB, lotIds: readonly string[]): Promise<Result<Map<string, LotLedger>, Error>> {
    const repository = new LotLedgerRepository(db);
    const ledgers = new Map<string, LotLedger>();

    for (const lotId of new Set(lotIds)) {
      const loaded = await repository.loadLotLedger(lotId);
      if (loaded.isErr()) {
        return err(loaded.error);
      }
      if (loaded.value) {
        ledgers.set(lotId, loaded.value);
      }
    }

    return ok(ledgers);
  }

  private async validateAndInsert(
    db: KyselyDB,
    target: ContributionTarget,
    requirements: MaterialRequirements,
    proposals: readonly ContributionProposal[]
  ): Promise<Result<CommittedContributions, Error>> {
    const validation = validateContributions(requirements, proposals, this.config);
    if (validation.isErr()) {
      logger.info(
        { reason: validation.error.reason, target: target.type },
        `Contributions rejected: ${validation.error.message}`
      );
      return err(validation.error);
    }

    const createdAt = new Date();
    const contributions: Contribution[] = validation.value.contributions.map((accepted) => ({
      id: uuidv4(),
      lotId: accepted.lotId,
      quantity: accepted.quantity,
      status: 'pending',
      target,
      createdAt,
    }));

    const inserted = await new ContributionRepository(db).createContributions(contributions);
    if (inserted.isErr()) {
      // Roll back the transaction
      throw inserted.error;
    }

    logger.info(
      {
        target: target.type,
        count: contributions.length,
        totalContributedWeight: validation.value.totalContributedWeight.toFixed(),
      },
      'Committed contributions'
    );

    return ok({ contributions, validation: validation.value });
  }
}
