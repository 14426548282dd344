export {
  closeDatabase,
  createDatabase,
  getMigrationStatus,
  initializeDatabase,
  runMigrations,
  type KyselyDB,
} from './database.js';
export { BaseRepository } from './repositories/base-repository.js';
export type * from './schema/database-schema.js';
