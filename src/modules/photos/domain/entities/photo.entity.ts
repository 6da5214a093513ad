export interface Photo {
  id: string;
  originalFileName: string;
  storedFileName: string;
  /** Kept for compatibility with older rows; never read. */
  filePath: string | null;
  fileSize: number;
  mimeType: string;
  uploadedAt: Date;
  width: number | null;
  height: number | null;
  photoData: Buffer;
}

/**
 * A photo about to be stored. `id` and `uploadedAt` are generated when absent.
 */
export interface NewPhoto {
  id?: string;
  originalFileName: string;
  storedFileName: string;
  filePath?: string | null;
  mimeType: string;
  uploadedAt?: Date;
  width?: number | null;
  height?: number | null;
  photoData: Buffer;
}

export interface PhotoRow {
  id: string;
  original_file_name: string;
  stored_file_name: string;
  file_path: string | null;
  file_size: number;
  mime_type: string;
  uploaded_at: Date;
  width: number | null;
  height: number | null;
  photo_data: Buffer;
}

export function rowToPhoto(row: PhotoRow): Photo {
  return {
    id: row.id,
    originalFileName: row.original_file_name,
    storedFileName: row.stored_file_name,
    filePath: row.file_path,
    fileSize: row.file_size,
    mimeType: row.mime_type,
    uploadedAt: row.uploaded_at,
    width: row.width,
    height: row.height,
    photoData: row.photo_data,
  };
}

/**
 * Gallery order: newest first, ties broken by id descending.
 */
export function compareNewestFirst(
  a: Pick<Photo, 'id' | 'uploadedAt'>,
  b: Pick<Photo, 'id' | 'uploadedAt'>,
): number {
  const byTime = b.uploadedAt.getTime() - a.uploadedAt.getTime();
  if (byTime !== 0) return byTime;
  if (a.id === b.id) return 0;
  return a.id < b.id ? 1 : -1;
}
