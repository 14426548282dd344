import { parseDecimal } from '@bullion-ledger/core';
import { describe, expect, it } from 'vitest';

import { GOLD_24K, RUBY_OVAL, directAllocation } from '../../test-utils/builders.js';
import { summarizeProductionConsumption } from '../production-consumption-utils.js';
import { calculateUnitRemainingWeight } from '../unit-weight-utils.js';

describe('calculateUnitRemainingWeight', () => {
  it('returns the full unit weight for untouched metal', () => {
    expect(calculateUnitRemainingWeight(GOLD_24K, undefined).toFixed()).toBe('10');
  });

  it('deducts consumed weight from metal units', () => {
    const consumption = summarizeProductionConsumption([
      directAllocation('a-1', 'u-1', '3.2'),
      directAllocation('a-2', 'u-1', '1.3'),
    ]).get('u-1');

    expect(calculateUnitRemainingWeight(GOLD_24K, consumption).toFixed()).toBe('5.5');
  });

  it('floors over-consumed metal at zero', () => {
    const consumption = summarizeProductionConsumption([directAllocation('a-1', 'u-1', '12')]).get('u-1');

    expect(calculateUnitRemainingWeight(GOLD_24K, consumption).toFixed()).toBe('0');
  });

  it('treats metal without a unit weight as empty', () => {
    const material = { ...GOLD_24K, unitWeight: undefined };

    expect(calculateUnitRemainingWeight(material, undefined).toFixed()).toBe('0');
  });

  it('counts stones as one regardless of consumption', () => {
    const consumption = summarizeProductionConsumption([directAllocation('a-1', 'u-1', '0.5')]).get('u-1');

    expect(calculateUnitRemainingWeight(RUBY_OVAL, consumption).toFixed()).toBe('1');
    expect(
      calculateUnitRemainingWeight({ ...RUBY_OVAL, materialType: 'other', unitWeight: parseDecimal('3') }, undefined).toFixed()
    ).toBe('1');
  });
});
