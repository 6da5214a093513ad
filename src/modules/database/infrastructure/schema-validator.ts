import type { Queryable } from './migrations/queryable';

interface ColumnInfo {
  column_name: string;
}

// Expected schema based on migrations
export const expectedSchema: Record<string, string[]> = {
  photos: [
    'id',
    'original_file_name',
    'stored_file_name',
    'file_path',
    'file_size',
    'mime_type',
    'uploaded_at',
    'width',
    'height',
    'photo_data',
  ],
};

export async function validateSchema(
  db: Queryable,
  schema: Record<string, string[]> = expectedSchema,
): Promise<{ valid: boolean; errors: string[] }> {
  const errors: string[] = [];

  for (const [tableName, expectedColumns] of Object.entries(schema)) {
    const { rows: actualColumns } = await db.query<ColumnInfo>(
      `SELECT column_name
       FROM information_schema.columns
       WHERE table_name = $1
       ORDER BY ordinal_position`,
      [tableName],
    );

    if (actualColumns.length === 0) {
      errors.push(`Table "${tableName}" does not exist`);
      continue;
    }

    const actualColumnNames = actualColumns.map((c) => c.column_name);

    for (const col of expectedColumns) {
      if (!actualColumnNames.includes(col)) {
        errors.push(`Table "${tableName}" is missing column "${col}"`);
      }
    }

    for (const col of actualColumnNames) {
      if (!expectedColumns.includes(col)) {
        errors.push(`Table "${tableName}" has unexpected column "${col}" (not in migrations)`);
      }
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
