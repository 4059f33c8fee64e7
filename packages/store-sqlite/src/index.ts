export { SqliteParcelStore } from './sqlite-parcel-store.js';
export { SqliteParcelTable } from './sqlite-parcel-table.js';
export {
  createDatabase,
  closeDatabase,
  ensureParcelSchema,
  IN_MEMORY,
  type DatabaseConnection,
} from './db/connection.js';
export { parcel, PARCEL_SCHEMA_SQL } from './db/schema.js';
