import { DomainError, type DomainErrorContext, formatDecimal } from '@bullion-ledger/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { LotLedger, LotStatus } from '../domain/types.js';
import { DEFAULT_RECONCILIATION_CONFIG, type ReconciliationConfig } from '../reconciliation/reconciliation-config.js';
import { calculateRemainingQuantity } from '../reconciliation/remaining-quantity-utils.js';

export type SaleRejectionReason =
  | 'not_purchase_lot'
  | 'lot_not_eligible'
  | 'invalid_quantity'
  | 'already_sold'
  | 'exceeds_available';

export class SaleRejectedError extends DomainError {
  readonly code = 'SALE_REJECTED';
  readonly severity = 'error' as const;

  constructor(
    public readonly reason: SaleRejectionReason,
    message: string,
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * Purchase lot statuses that can be sold from
 */
export const SELLABLE_LOT_STATUSES: readonly LotStatus[] = ['approved', 'completed'];

/**
 * Check a sale request against the lot it sells from.
 * Returns the lot's remaining quantity on success.
 */
export function validateSaleQuantity(
  ledger: LotLedger,
  requestedQuantity: Decimal,
  config: ReconciliationConfig = DEFAULT_RECONCILIATION_CONFIG
): Result<Decimal, SaleRejectedError> {
  const { lot } = ledger;
  const context = { additionalContext: { lotId: lot.id, requestedQuantity: requestedQuantity.toFixed() } };

  if (lot.requestType !== 'purchase') {
    return err(new SaleRejectedError('not_purchase_lot', `Lot ${lot.id} is not a purchase lot`, context));
  }

  if (!SELLABLE_LOT_STATUSES.includes(lot.status)) {
    return err(
      new SaleRejectedError('lot_not_eligible', `Lot ${lot.id} must be approved or completed to sell (is ${lot.status})`, context)
    );
  }

  if (requestedQuantity.lte(0)) {
    return err(new SaleRejectedError('invalid_quantity', 'Quantity must be greater than zero', context));
  }

  const remaining = calculateRemainingQuantity(ledger, config) ?? new Decimal(0);
  if (remaining.lte(0)) {
    return err(new SaleRejectedError('already_sold', `Lot ${lot.id} has already been sold`, context));
  }

  if (requestedQuantity.gt(remaining)) {
    return err(
      new SaleRejectedError(
        'exceeds_available',
        `Requested quantity exceeds available quantity (${formatDecimal(remaining, 2)})`,
        context
      )
    );
  }

  return ok(remaining);
}
