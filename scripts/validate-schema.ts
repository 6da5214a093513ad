#!/usr/bin/env node
import { Pool } from 'pg';
import { validateSchema } from '../src/modules/database/infrastructure/schema-validator';
import { buildPoolConfig } from '../src/modules/database/infrastructure/pg-pool.service';

async function main() {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    console.error('DATABASE_URL environment variable is required');
    return 1;
  }

  const pool = new Pool(
    buildPoolConfig(databaseUrl, { ssl: process.env.DATABASE_SSL === 'true', max: 1 }),
  );

  console.log('Validating database schema against migrations...\n');

  try {
    const { valid, errors } = await validateSchema(pool);

    if (valid) {
      console.log('✓ Schema is valid - database matches migrations\n');
      return 0;
    }

    console.error('✗ Schema validation failed:\n');
    for (const error of errors) {
      console.error(`  - ${error}`);
    }
    console.error('\nFix: Create a migration to reconcile the differences.\n');
    return 1;
  } finally {
    await pool.end();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('Schema validation failed:', error);
    process.exit(1);
  });
