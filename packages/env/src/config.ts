import path from 'node:path';

import { z } from 'zod';

export const TerminatedStoneUsagePolicySchema = z.enum(['full_quantity', 'allocated_units']);

export type TerminatedStoneUsagePolicy = z.infer<typeof TerminatedStoneUsagePolicySchema>;

const envSchema = z.object({
  BULLION_LEDGER_DATA_DIR: z.string().min(1).or(z.undefined()),
  BULLION_LEDGER_DB_FILENAME: z.string().min(1).default('ledger.db'),
  BULLION_LEDGER_TERMINATED_STONE_USAGE: TerminatedStoneUsagePolicySchema.default('full_quantity'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Parse an environment object. Throws with one line per invalid variable.
 */
export function parseEnv(env: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access and caches the result.
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Drop the cached environment so the next read re-validates process.env.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Data directory for the SQLite database.
 *
 * BULLION_LEDGER_DATA_DIR when set, otherwise `<cwd>/data`.
 */
export function getDataDirectory(): string {
  const env = validateEnv();
  return env.BULLION_LEDGER_DATA_DIR ?? path.join(process.cwd(), 'data');
}

export function getDatabasePath(): string {
  return path.join(getDataDirectory(), validateEnv().BULLION_LEDGER_DB_FILENAME);
}

/**
 * How terminated stone contributions count against a lot's capacity.
 */
export function getTerminatedStoneUsagePolicy(): TerminatedStoneUsagePolicy {
  return validateEnv().BULLION_LEDGER_TERMINATED_STONE_USAGE;
}
