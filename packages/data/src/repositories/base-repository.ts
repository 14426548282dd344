import { RepositoryError } from '@bullion-ledger/core';
import { getLogger, type Logger } from '@bullion-ledger/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import type { KyselyDB } from '../database.js';

/**
 * Base repository class for Kysely-based database operations
 */
export abstract class BaseRepository {
  protected db: KyselyDB;
  protected logger: Logger;

  constructor(db: KyselyDB, repositoryName: string) {
    this.db = db;
    this.logger = getLogger(repositoryName);
  }

  /**
   * Fixed-point text for a decimal column; never exponent notation
   */
  protected toDecimalString(value: Decimal): string {
    return value.toFixed();
  }

  protected getCurrentDateTimeForDB(): string {
    return new Date().toISOString();
  }

  /**
   * Validate a mapped row against its domain schema
   */
  protected parseWithSchema<T>(value: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T, Error> {
    const result = schema.safeParse(value);

    if (!result.success) {
      this.logger.warn({ error: result.error.message }, 'Failed to validate row with schema');
      return err(new RepositoryError('VALIDATION_FAILED', `Schema validation failed: ${result.error.message}`));
    }

    return ok(result.data);
  }

  /**
   * Validate a batch of mapped rows; the first invalid row fails the batch
   */
  protected parseAllWithSchema<T>(values: readonly unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T[], Error> {
    const parsed: T[] = [];
    for (const value of values) {
      const result = this.parseWithSchema(value, schema);
      if (result.isErr()) {
        return err(result.error);
      }
      parsed.push(result.value);
    }
    return ok(parsed);
  }
}
