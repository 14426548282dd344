import { describe, expect, it } from 'vitest';

import { createHistory, directAllocation, historyAllocation } from '../../test-utils/builders.js';
import {
  getConsumedWeight,
  hasProductionAllocations,
  summarizeProductionConsumption,
} from '../production-consumption-utils.js';

describe('summarizeProductionConsumption', () => {
  it('splits direct and contract-history weight per unit', () => {
    const history = createHistory('h-1', 'u-1', 'contract-1');

    const consumption = summarizeProductionConsumption([
      directAllocation('a-1', 'u-1', '2.5'),
      historyAllocation('a-2', history, '1.25'),
      directAllocation('a-3', 'u-1', '0.5'),
      directAllocation('a-4', 'u-2', '4'),
    ]);

    const first = consumption.get('u-1');
    expect(first?.directWeight.toFixed()).toBe('3');
    expect(first?.contractHistoryWeight.toFixed()).toBe('1.25');
    expect(first?.allocationCount).toBe(3);
    expect(consumption.get('u-2')?.directWeight.toFixed()).toBe('4');
    expect(consumption.has('u-3')).toBe(false);
  });

  it('returns an empty map without allocations', () => {
    expect(summarizeProductionConsumption([]).size).toBe(0);
  });
});

describe('getConsumedWeight', () => {
  it('adds both consumption kinds', () => {
    const consumption = summarizeProductionConsumption([
      directAllocation('a-1', 'u-1', '1.5'),
      historyAllocation('a-2', createHistory('h-1', 'u-1', 'contract-1'), '2'),
    ]).get('u-1');

    expect(getConsumedWeight(consumption).toFixed()).toBe('3.5');
  });

  it('is zero for a unit production never touched', () => {
    expect(getConsumedWeight(undefined).toFixed()).toBe('0');
    expect(hasProductionAllocations(undefined)).toBe(false);
  });
});
