import type { Migration } from './migration.interface';
import { createPhotos } from './001_create_photos';

// Export all migrations in order
// Add new migrations to this array as they are created
export const migrations: Migration[] = [createPhotos];

export type { Migration } from './migration.interface';
export type { Queryable } from './queryable';
export { runMigrations, getMigrationStatus } from './migration-runner';
