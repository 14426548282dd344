import { initializeDatabase, type KyselyDB } from '@bullion-ledger/data';

/**
 * Fresh migrated in-memory database
 */
export async function createTestDatabase(): Promise<KyselyDB> {
  const result = await initializeDatabase(':memory:');
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}
