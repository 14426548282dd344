import { describe, expect, it } from 'vitest';

import { createLotLedger } from '../../domain/lot-ledger.js';
import type { ContractStatus } from '../../domain/types.js';
import { createHistory, createLot, createUnits } from '../../test-utils/builders.js';
import { findAvailableUnits, findUnitsInActiveContracts, isActiveContractStatus } from '../unit-availability-utils.js';

describe('isActiveContractStatus', () => {
  it.each(['active', 'renew', 'under_termination'] as const)('treats %s as active', (status) => {
    expect(isActiveContractStatus(status)).toBe(true);
  });

  it.each(['not_assigned', 'completed', 'terminated', 'closed'] as const)('treats %s as released', (status) => {
    expect(isActiveContractStatus(status)).toBe(false);
  });

  it('treats an unknown contract as released', () => {
    expect(isActiveContractStatus(undefined)).toBe(false);
  });
});

describe('findAvailableUnits', () => {
  const lot = createLot();

  it('excludes units pointed at a sale lot or pool', () => {
    const [u1, u2, u3] = createUnits(lot.id, 3);
    if (!u1 || !u2 || !u3) throw new Error('expected three units');

    const ledger = createLotLedger(lot, {
      units: [{ ...u1, saleLotId: 'sale-1' }, { ...u2, poolId: 'pool-1' }, u3],
    });

    expect(findAvailableUnits(ledger).map((unit) => unit.id)).toEqual(['lot-1-u3']);
  });

  it('excludes units held by an active contract through the direct pointer', () => {
    const [u1, u2] = createUnits(lot.id, 2);
    if (!u1 || !u2) throw new Error('expected two units');

    const ledger = createLotLedger(lot, {
      units: [
        { ...u1, contractId: 'contract-active' },
        { ...u2, contractId: 'contract-closed' },
      ],
      contractStatuses: new Map<string, ContractStatus>([
        ['contract-active', 'active'],
        ['contract-closed', 'closed'],
      ]),
    });

    expect(findAvailableUnits(ledger).map((unit) => unit.id)).toEqual(['lot-1-u2']);
  });

  it('excludes units held by an active contract only through history', () => {
    const units = createUnits(lot.id, 3);
    const ledger = createLotLedger(lot, {
      units,
      contractHistories: [
        createHistory('h-1', 'lot-1-u1', 'contract-renewed'),
        createHistory('h-2', 'lot-1-u2', 'contract-terminated'),
      ],
      contractStatuses: new Map<string, ContractStatus>([
        ['contract-renewed', 'renew'],
        ['contract-terminated', 'terminated'],
      ]),
    });

    expect([...findUnitsInActiveContracts(ledger)]).toEqual(['lot-1-u1']);
    expect(findAvailableUnits(ledger).map((unit) => unit.id)).toEqual(['lot-1-u2', 'lot-1-u3']);
  });

  it('excludes soft-deleted units', () => {
    const [u1, u2] = createUnits(lot.id, 2);
    if (!u1 || !u2) throw new Error('expected two units');

    const ledger = createLotLedger(lot, {
      units: [{ ...u1, deletedAt: new Date('2025-04-01T00:00:00.000Z') }, u2],
    });

    expect(findAvailableUnits(ledger).map((unit) => unit.id)).toEqual(['lot-1-u2']);
  });
});
