export { openDatabase } from './database.js';
export type { CoachDatabase } from './database.js';
export { runMigrations, MIGRATIONS } from './migrations.js';
export type { Migration } from './migrations.js';
export { HealthLogRepository } from './health-logs.js';
export { SuggestionRepository } from './suggestions.js';
export type { StoredSuggestion } from './suggestions.js';
export { ChunkRepository } from './chunks.js';

export type { HealthLogEntry, HealthLogInsert, DatabaseConfig } from '../shared/types.js';
export { getDbPath, getDatabaseConfig, isDebugEnabled } from '../shared/config.js';
