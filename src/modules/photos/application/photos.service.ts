import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { extname } from 'node:path';
import {
  logFailedResults,
  processInBatchesSettled,
} from '../../../common/utils/concurrency';
import type { Photo } from '../domain/entities/photo.entity';
import {
  IPhotosRepositoryToken,
  type IPhotosRepository,
} from '../domain/photos.repository.interface';
import {
  validateUpload,
  type AllowedMimeType,
  type UploadCandidate,
} from '../domain/upload-policy';
import { PhotoMetadataService } from './photo-metadata.service';

const EXTENSION_BY_MIME_TYPE: Record<AllowedMimeType, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
};

export type UploadOutcome =
  | { success: true; photo: Photo }
  | { success: false; fileName: string; error: string };

export interface BatchUploadResult {
  success: boolean;
  uploadedPhotos: Array<{ id: string; originalFileName: string }>;
  failedUploads: Array<{ fileName: string; error: string }>;
}

export interface PhotoNavigation {
  previousPhotoId: string | null;
  nextPhotoId: string | null;
}

@Injectable()
export class PhotosService {
  private readonly logger = new Logger(PhotosService.name);
  private lastUploadedAtMs = 0;

  constructor(
    @Inject(IPhotosRepositoryToken)
    private readonly photosRepository: IPhotosRepository,
    private readonly metadataService: PhotoMetadataService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Validates and stores one file. Rejections are returned, storage errors thrown.
   */
  async uploadPhoto(candidate: UploadCandidate): Promise<UploadOutcome> {
    const validation = validateUpload(candidate);
    if (!validation.valid) {
      this.logger.warn(`Rejected upload "${candidate.fileName}": ${validation.reason}`);
      return { success: false, fileName: candidate.fileName, error: validation.reason };
    }

    const dimensions = await this.metadataService.extractDimensions(
      candidate.data,
      validation.mimeType,
    );

    const id = randomUUID();
    const photo = await this.photosRepository.save({
      id,
      originalFileName: candidate.fileName,
      storedFileName: this.buildStoredFileName(candidate.fileName, validation.mimeType),
      filePath: null,
      mimeType: validation.mimeType,
      width: dimensions?.width ?? null,
      height: dimensions?.height ?? null,
      photoData: candidate.data,
      uploadedAt: this.nextUploadedAt(),
    });

    this.logger.log(
      `Stored photo ${photo.id} (${photo.originalFileName}, ${photo.fileSize} bytes)`,
    );
    return { success: true, photo };
  }

  /**
   * Each file is handled on its own; a rejected file never affects the others.
   * A storage failure fails the batch once every file has been attempted.
   */
  async uploadPhotos(candidates: UploadCandidate[]): Promise<BatchUploadResult> {
    const concurrency = this.configService.get<number>('uploads.concurrency') ?? 1;

    const results = await processInBatchesSettled(
      candidates,
      (candidate) => this.uploadPhoto(candidate),
      concurrency,
    );

    const failure = logFailedResults(results, 'uploadPhotos', this.logger);
    if (failure) {
      throw failure;
    }

    const response: BatchUploadResult = {
      success: false,
      uploadedPhotos: [],
      failedUploads: [],
    };

    for (const result of results) {
      if (result.status !== 'fulfilled') continue;
      const outcome = result.value;
      if (outcome.success) {
        response.uploadedPhotos.push({
          id: outcome.photo.id,
          originalFileName: outcome.photo.originalFileName,
        });
      } else {
        response.failedUploads.push({ fileName: outcome.fileName, error: outcome.error });
      }
    }

    response.success = response.uploadedPhotos.length > 0;
    return response;
  }

  async getPhotoById(id: string): Promise<Photo | null> {
    const trimmed = id.trim();
    if (!trimmed) {
      return null;
    }
    return this.photosRepository.findById(trimmed);
  }

  getAllPhotos(): Promise<Photo[]> {
    return this.photosRepository.listAll();
  }

  async getPage(limit: number, offset: number) {
    const [photos, total] = await Promise.all([
      this.photosRepository.findPage(limit, offset),
      this.photosRepository.count(),
    ]);
    return { photos, total, limit, offset };
  }

  /** Next older photo. */
  getPreviousPhoto(photo: Pick<Photo, 'id' | 'uploadedAt'>): Promise<Photo | null> {
    return this.photosRepository.findBefore(photo.uploadedAt, photo.id);
  }

  /** Next newer photo. */
  getNextPhoto(photo: Pick<Photo, 'id' | 'uploadedAt'>): Promise<Photo | null> {
    return this.photosRepository.findAfter(photo.uploadedAt, photo.id);
  }

  async getNavigation(photo: Pick<Photo, 'id' | 'uploadedAt'>): Promise<PhotoNavigation> {
    const [previous, next] = await Promise.all([
      this.getPreviousPhoto(photo),
      this.getNextPhoto(photo),
    ]);
    return {
      previousPhotoId: previous?.id ?? null,
      nextPhotoId: next?.id ?? null,
    };
  }

  async deletePhoto(id: string): Promise<boolean> {
    const trimmed = id.trim();
    if (!trimmed) {
      return false;
    }

    const deleted = await this.photosRepository.delete(trimmed);
    if (deleted) {
      this.logger.log(`Deleted photo ${trimmed}`);
    } else {
      this.logger.warn(`Delete requested for unknown photo ${trimmed}`);
    }
    return deleted;
  }

  /**
   * Upload time, bumped past the previous one when the clock has not advanced
   * so photos of one batch keep their upload order.
   */
  private nextUploadedAt(): Date {
    this.lastUploadedAtMs = Math.max(Date.now(), this.lastUploadedAtMs + 1);
    return new Date(this.lastUploadedAtMs);
  }

  private buildStoredFileName(originalFileName: string, mimeType: AllowedMimeType) {
    const ext = extname(originalFileName).toLowerCase() || EXTENSION_BY_MIME_TYPE[mimeType];
    return `${randomUUID()}${ext}`;
  }
}
