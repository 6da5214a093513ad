#!/usr/bin/env node
import { Pool } from 'pg';
import {
  runMigrations,
  getMigrationStatus,
} from '../src/modules/database/infrastructure/migrations';
import { buildPoolConfig } from '../src/modules/database/infrastructure/pg-pool.service';

const usage = `
Database Migration CLI

Usage: npm run migrate -- [command]

Commands:
  up      Run all pending migrations (default)
  down    Rollback the last applied migration
  status  Show migration status

Environment:
  DATABASE_URL  Required. PostgreSQL connection string.
  DATABASE_SSL  Optional. "true" to connect over TLS.

Examples:
  npm run migrate             # Run pending migrations
  npm run migrate -- down     # Rollback last migration
  npm run migrate -- status   # Show status
`;

async function main() {
  const command = process.argv[2] || 'up';

  if (command === '--help' || command === '-h') {
    console.log(usage);
    return 0;
  }

  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error('Error: DATABASE_URL environment variable is not set');
    return 1;
  }

  const pool = new Pool(
    buildPoolConfig(databaseUrl, { ssl: process.env.DATABASE_SSL === 'true', max: 2 }),
  );

  try {
    await pool.query('SELECT 1');
    console.log('Connected to database');

    switch (command) {
      case 'up': {
        console.log('\nRunning migrations...\n');
        const result = await runMigrations(pool, 'up');

        if (result.applied.length === 0) {
          console.log('\nNo pending migrations');
        } else {
          console.log(`\nApplied ${result.applied.length} migration(s):`);
          result.applied.forEach((name) => console.log(`  - ${name}`));
        }
        return 0;
      }

      case 'down': {
        console.log('\nRolling back last migration...\n');
        const result = await runMigrations(pool, 'down');

        if (result.applied.length === 0) {
          console.log('\nNo migrations to rollback');
        } else {
          console.log(`\nRolled back ${result.applied.length} migration(s):`);
          result.applied.forEach((name) => console.log(`  - ${name}`));
        }
        return 0;
      }

      case 'status': {
        const status = await getMigrationStatus(pool);

        console.log('\nMigration Status\n');

        if (status.applied.length > 0) {
          console.log('Applied migrations:');
          status.applied.forEach((m) =>
            console.log(`  - ${m.name} (${m.applied_at.toISOString()})`),
          );
        } else {
          console.log('No applied migrations');
        }

        console.log('');

        if (status.pending.length > 0) {
          console.log('Pending migrations:');
          status.pending.forEach((name) => console.log(`  - ${name}`));
        } else {
          console.log('No pending migrations');
        }
        return 0;
      }

      default:
        console.error(`Unknown command: ${command}`);
        console.log(usage);
        return 1;
    }
  } catch (error) {
    console.error('Migration failed:', error);
    return 1;
  } finally {
    await pool.end();
  }
}

main().then((code) => process.exit(code));
