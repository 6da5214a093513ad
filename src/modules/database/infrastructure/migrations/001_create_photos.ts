import type { Migration } from './migration.interface';
import type { Queryable } from './queryable';

export const createPhotos: Migration = {
  name: '001_create_photos',

  async up(db: Queryable): Promise<void> {
    await db.query(`
      CREATE TABLE IF NOT EXISTS photos (
        id UUID PRIMARY KEY,
        original_file_name VARCHAR(255) NOT NULL,
        stored_file_name VARCHAR(255) NOT NULL,
        file_path VARCHAR(500),
        file_size INTEGER NOT NULL,
        mime_type VARCHAR(100) NOT NULL,
        uploaded_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        width INTEGER,
        height INTEGER,
        photo_data BYTEA NOT NULL,
        CONSTRAINT photos_file_size_matches_data CHECK (file_size = octet_length(photo_data))
      )
    `);

    // Gallery order and prev/next lookups
    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_photos_uploaded_at_id
      ON photos (uploaded_at DESC, id DESC)
    `);
  },

  async down(db: Queryable): Promise<void> {
    await db.query(`DROP INDEX IF EXISTS idx_photos_uploaded_at_id`);
    await db.query(`DROP TABLE IF EXISTS photos`);
  },
};
