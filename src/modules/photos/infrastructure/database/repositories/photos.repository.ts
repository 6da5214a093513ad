import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { PgPoolService } from '../../../../database/infrastructure/pg-pool.service';
import {
  rowToPhoto,
  type NewPhoto,
  type Photo,
  type PhotoRow,
} from '../../../domain/entities/photo.entity';
import type { IPhotosRepository } from '../../../domain/photos.repository.interface';

const PHOTO_COLUMNS = `
  id, original_file_name, stored_file_name, file_path, file_size,
  mime_type, uploaded_at, width, height, photo_data
`;

@Injectable()
export class PhotosRepository implements IPhotosRepository {
  constructor(private readonly db: PgPoolService) {}

  async save(photo: NewPhoto): Promise<Photo> {
    const { rows } = await this.db.query<PhotoRow>(
      `
      INSERT INTO photos (
        id, original_file_name, stored_file_name, file_path, file_size,
        mime_type, uploaded_at, width, height, photo_data
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING ${PHOTO_COLUMNS}
      `,
      [
        photo.id ?? randomUUID(),
        photo.originalFileName,
        photo.storedFileName,
        photo.filePath ?? null,
        photo.photoData.length,
        photo.mimeType,
        photo.uploadedAt ?? new Date(),
        photo.width ?? null,
        photo.height ?? null,
        photo.photoData,
      ],
    );

    return rowToPhoto(rows[0]);
  }

  async findById(id: string): Promise<Photo | null> {
    // Non-UUID ids cannot match and would make Postgres raise a cast error
    if (!isUuid(id)) {
      return null;
    }

    const { rows } = await this.db.query<PhotoRow>(
      `SELECT ${PHOTO_COLUMNS} FROM photos WHERE id = $1 LIMIT 1`,
      [id],
    );
    return rows[0] ? rowToPhoto(rows[0]) : null;
  }

  async listAll(): Promise<Photo[]> {
    const { rows } = await this.db.query<PhotoRow>(
      `SELECT ${PHOTO_COLUMNS} FROM photos ORDER BY uploaded_at DESC, id DESC`,
    );
    return rows.map(rowToPhoto);
  }

  async findPage(limit: number, offset: number): Promise<Photo[]> {
    const { rows } = await this.db.query<PhotoRow>(
      `
      SELECT ${PHOTO_COLUMNS} FROM photos
      ORDER BY uploaded_at DESC, id DESC
      LIMIT $1 OFFSET $2
      `,
      [limit, offset],
    );
    return rows.map(rowToPhoto);
  }

  async findBefore(uploadedAt: Date, id?: string): Promise<Photo | null> {
    const { rows } = id
      ? await this.db.query<PhotoRow>(
          `
          SELECT ${PHOTO_COLUMNS} FROM photos
          WHERE uploaded_at < $1 OR (uploaded_at = $1 AND id < $2)
          ORDER BY uploaded_at DESC, id DESC
          LIMIT 1
          `,
          [uploadedAt, id],
        )
      : await this.db.query<PhotoRow>(
          `
          SELECT ${PHOTO_COLUMNS} FROM photos
          WHERE uploaded_at < $1
          ORDER BY uploaded_at DESC, id DESC
          LIMIT 1
          `,
          [uploadedAt],
        );
    return rows[0] ? rowToPhoto(rows[0]) : null;
  }

  async findAfter(uploadedAt: Date, id?: string): Promise<Photo | null> {
    const { rows } = id
      ? await this.db.query<PhotoRow>(
          `
          SELECT ${PHOTO_COLUMNS} FROM photos
          WHERE uploaded_at > $1 OR (uploaded_at = $1 AND id > $2)
          ORDER BY uploaded_at ASC, id ASC
          LIMIT 1
          `,
          [uploadedAt, id],
        )
      : await this.db.query<PhotoRow>(
          `
          SELECT ${PHOTO_COLUMNS} FROM photos
          WHERE uploaded_at > $1
          ORDER BY uploaded_at ASC, id ASC
          LIMIT 1
          `,
          [uploadedAt],
        );
    return rows[0] ? rowToPhoto(rows[0]) : null;
  }

  async delete(id: string): Promise<boolean> {
    if (!isUuid(id)) {
      return false;
    }

    const { rowCount } = await this.db.query(`DELETE FROM photos WHERE id = $1`, [id]);
    return (rowCount ?? 0) > 0;
  }

  async count(): Promise<number> {
    const { rows } = await this.db.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM photos`,
    );
    return Number.parseInt(rows[0]?.count ?? '0', 10);
  }
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const isUuid = (value: string) => UUID_PATTERN.test(value);
