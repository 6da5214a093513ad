import { migrations as defaultMigrations } from './index';
import type { Migration } from './migration.interface';
import type { ConnectionSource, Queryable } from './queryable';

interface AppliedMigration {
  name: string;
  applied_at: Date;
}

type LoggerLike = {
  log: (message: string) => void;
};

async function ensureMigrationsTable(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
    )
  `);
}

async function getAppliedMigrations(db: Queryable): Promise<AppliedMigration[]> {
  const { rows } = await db.query<AppliedMigration>(
    `SELECT name, applied_at FROM _migrations ORDER BY id ASC`,
  );
  return rows;
}

async function inTransaction(db: Queryable, fn: () => Promise<void>): Promise<void> {
  await db.query('BEGIN');
  try {
    await fn();
    await db.query('COMMIT');
  } catch (error) {
    await db.query('ROLLBACK');
    throw error;
  }
}

export async function runMigrations(
  source: ConnectionSource,
  direction: 'up' | 'down' = 'up',
  logger: LoggerLike = console,
  migrations: Migration[] = defaultMigrations,
): Promise<{ applied: string[]; skipped: string[] }> {
  const db = await source.connect();

  try {
    await ensureMigrationsTable(db);

    const applied = await getAppliedMigrations(db);
    const appliedNames = new Set(applied.map((m) => m.name));

    const result = { applied: [] as string[], skipped: [] as string[] };

    if (direction === 'up') {
      for (const migration of migrations) {
        if (appliedNames.has(migration.name)) {
          result.skipped.push(migration.name);
          continue;
        }

        logger.log(`Running migration: ${migration.name}`);
        await inTransaction(db, async () => {
          await migration.up(db);
          await db.query(`INSERT INTO _migrations (name) VALUES ($1)`, [migration.name]);
        });
        result.applied.push(migration.name);
        logger.log(`Completed migration: ${migration.name}`);
      }
      return result;
    }

    // Rollback: run down() on the last applied migration
    const lastApplied = applied[applied.length - 1];
    if (!lastApplied) {
      logger.log('No migrations to rollback');
      return result;
    }

    const migration = migrations.find((m) => m.name === lastApplied.name);
    if (!migration) {
      throw new Error(`Migration not found: ${lastApplied.name}`);
    }

    logger.log(`Rolling back migration: ${migration.name}`);
    await inTransaction(db, async () => {
      await migration.down(db);
      await db.query(`DELETE FROM _migrations WHERE name = $1`, [migration.name]);
    });
    result.applied.push(migration.name);
    logger.log(`Rolled back migration: ${migration.name}`);

    return result;
  } finally {
    db.release();
  }
}

export async function getMigrationStatus(
  source: ConnectionSource,
  migrations: Migration[] = defaultMigrations,
): Promise<{ pending: string[]; applied: AppliedMigration[] }> {
  const db = await source.connect();

  try {
    await ensureMigrationsTable(db);

    const applied = await getAppliedMigrations(db);
    const appliedNames = new Set(applied.map((m) => m.name));

    const pending = migrations
      .filter((m) => !appliedNames.has(m.name))
      .map((m) => m.name);

    return { pending, applied };
  } finally {
    db.release();
  }
}
