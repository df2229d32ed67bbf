export { MemoryStorage, type Storage, type StorageEntry } from './storage.js';
export { CacheStorage } from './cache-storage.js';
export { SqliteStorage } from './sqlite-storage.js';
export { createSqliteDatabase, openStateDatabase } from './database.js';
export { runMigrations } from './migrations.js';
export { stateMigrations } from './migrations/index.js';
export { closeSqliteDatabase } from './close.js';
export type { ContractStateTable, StateDatabase } from './schema.js';
