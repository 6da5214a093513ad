import type { Photo } from '../../domain/entities/photo.entity';

export interface PhotoSummary {
  id: string;
  originalFileName: string;
  storedFileName: string;
  filePath: string | null;
  fileSize: number;
  mimeType: string;
  uploadedAt: string;
  width: number | null;
  height: number | null;
  url: string;
  detailUrl: string;
}

export function toPhotoSummary(photo: Photo): PhotoSummary {
  return {
    id: photo.id,
    originalFileName: photo.originalFileName,
    storedFileName: photo.storedFileName,
    filePath: photo.filePath,
    fileSize: photo.fileSize,
    mimeType: photo.mimeType,
    uploadedAt: photo.uploadedAt.toISOString(),
    width: photo.width,
    height: photo.height,
    url: `/photo/${photo.id}`,
    detailUrl: `/detail/${photo.id}`,
  };
}
