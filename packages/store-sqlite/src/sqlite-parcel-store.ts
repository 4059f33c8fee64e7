import { GuardedParcelStore, type ParcelStoreOptions } from '@parcelkeeper/core';
import { closeDatabase, createDatabase, type DatabaseConnection } from './db/connection.js';
import { SqliteParcelTable } from './sqlite-parcel-table.js';

/**
 * SqliteParcelStore
 * Parcel store persisted in SQLite.
 *
 * `close()` closes the connection the store runs on, whether `open()` created
 * it or the caller passed it in. A store built without a connection fails
 * every call with NoConnection.
 */
export class SqliteParcelStore extends GuardedParcelStore {
  constructor(
    readonly connection?: DatabaseConnection,
    options: ParcelStoreOptions = {}
  ) {
    super(connection ? new SqliteParcelTable(connection) : undefined, options);
  }

  /**
   * Open (and create if needed) the database at `path`, then build a store on it
   */
  static open(path: string, options: ParcelStoreOptions = {}): SqliteParcelStore {
    return new SqliteParcelStore(createDatabase(path), options);
  }

  close(): void {
    if (this.connection) {
      closeDatabase(this.connection.sqlite);
    }
  }
}
