import { RepositoryError } from '@bullion-ledger/core';
import type { KyselyDB } from '@bullion-ledger/data';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { LotLedger } from '../domain/types.js';
import { ContributionRepository } from '../persistence/contribution-repository.js';
import { LotLedgerRepository, type LoadLotLedgerOptions } from '../persistence/lot-ledger-repository.js';
import { getContributionUsageOrDefault, type ContributionUsage } from '../reconciliation/contribution-usage-utils.js';
import { reconcileLot, type LotReconciliation } from '../reconciliation/lot-reconciler.js';
import { loadReconciliationConfig, type ReconciliationConfig } from '../reconciliation/reconciliation-config.js';
import { validateSaleQuantity } from '../sales/sale-eligibility.js';

/**
 * Read-side lot figures computed fresh from the database on every call
 */
export class LotQueryService {
  private readonly ledgerRepository: LotLedgerRepository;
  private readonly contributionRepository: ContributionRepository;

  constructor(
    db: KyselyDB,
    private readonly config: ReconciliationConfig = loadReconciliationConfig()
  ) {
    this.ledgerRepository = new LotLedgerRepository(db);
    this.contributionRepository = new ContributionRepository(db);
  }

  /**
   * Reconcile a lot. A sale lot resolves to the purchase lot it sells from.
   */
  async getLotReconciliation(
    lotId: string,
    options: LoadLotLedgerOptions = {}
  ): Promise<Result<LotReconciliation, Error>> {
    const ledger = await this.loadAllocatableLedger(lotId, options);
    if (ledger.isErr()) {
      return err(ledger.error);
    }

    return ok(reconcileLot(ledger.value, this.config));
  }

  async getContributionUsage(contributionId: string): Promise<Result<ContributionUsage | null, Error>> {
    const contribution = await this.contributionRepository.findById(contributionId);
    if (contribution.isErr()) {
      return err(contribution.error);
    }
    if (!contribution.value) {
      return err(new RepositoryError('NOT_FOUND', `Contribution ${contributionId} not found`));
    }

    const ledger = await this.loadLedger(contribution.value.lotId, {});
    if (ledger.isErr()) {
      return err(ledger.error);
    }

    return ok(getContributionUsageOrDefault(contribution.value, ledger.value));
  }

  /**
   * Check a sale against its purchase lot; returns the lot's remaining quantity
   */
  async checkSaleQuantity(lotId: string, requestedQuantity: Decimal): Promise<Result<Decimal, Error>> {
    const ledger = await this.loadLedger(lotId, {});
    if (ledger.isErr()) {
      return err(ledger.error);
    }

    return validateSaleQuantity(ledger.value, requestedQuantity, this.config);
  }

  private async loadLedger(lotId: string, options: LoadLotLedgerOptions): Promise<Result<LotLedger, Error>> {
    const loaded = await this.ledgerRepository.loadLotLedger(lotId, options);
    if (loaded.isErr()) {
      return err(loaded.error);
    }
    if (!loaded.value) {
      return err(new RepositoryError('NOT_FOUND', `Lot ${lotId} not found`));
    }
    return ok(loaded.value);
  }

  private async loadAllocatableLedger(lotId: string, options: LoadLotLedgerOptions): Promise<Result<LotLedger, Error>> {
    const ledger = await this.loadLedger(lotId, options);
    if (ledger.isErr()) {
      return err(ledger.error);
    }

    const { lot } = ledger.value;
    if (lot.requestType === 'sale' && lot.relatedLotId) {
      return this.loadLedger(lot.relatedLotId, options);
    }

    return ok(ledger.value);
  }
}
