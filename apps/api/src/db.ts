import { createDb, migrate, type DB } from '@cardwise/engine';

export function openDb(dbPath: string): DB {
  const db = createDb(dbPath);
  migrate(db);
  return db;
}
