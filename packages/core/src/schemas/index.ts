import { Decimal } from 'decimal.js';
import { z } from 'zod';

// Custom Zod type for Decimal.js instances
export const DecimalSchema = z.instanceof(Decimal, {
  message: 'Expected Decimal instance',
});

/**
 * Decimal stored as TEXT; parsed back into a Decimal instance
 */
export const DecimalStringSchema = z
  .union([z.string().min(1), z.number()])
  .refine(
    (value) => {
      try {
        new Decimal(value);
        return true;
      } catch {
        return false;
      }
    },
    { message: 'Expected a decimal string' }
  )
  .transform((value) => new Decimal(value));

export const NonNegativeDecimalSchema = DecimalSchema.refine((value) => !value.isNegative(), {
  message: 'Value must not be negative',
});

// Accepts Date instances, ISO strings and unix seconds
export const DateSchema = z
  .union([z.date(), z.string().datetime({ offset: true }), z.number().int().nonnegative()])
  .transform((value) => {
    if (value instanceof Date) return value;
    if (typeof value === 'number') return new Date(value * 1000);
    return new Date(value);
  });
