import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { InMemoryPhotosRepository } from '../../../../test/support/in-memory-photos.repository';
import { createPng, sleep } from '../../../../test/support/fixtures';
import { IPhotosRepositoryToken } from '../domain/photos.repository.interface';
import {
  EMPTY_FILE_MESSAGE,
  FILE_TOO_LARGE_MESSAGE,
  UNSUPPORTED_TYPE_MESSAGE,
  type UploadCandidate,
} from '../domain/upload-policy';
import { PhotoMetadataService } from './photo-metadata.service';
import { PhotosService } from './photos.service';

const file = (fileName: string, mimeType: string, data: Buffer): UploadCandidate => ({
  fileName,
  mimeType,
  size: data.length,
  data,
});

const at = (iso: string) => new Date(iso);

describe('PhotosService', () => {
  let repository: InMemoryPhotosRepository;
  let service: PhotosService;

  beforeEach(async () => {
    repository = new InMemoryPhotosRepository();

    const moduleRef = await Test.createTestingModule({
      providers: [
        PhotosService,
        PhotoMetadataService,
        { provide: IPhotosRepositoryToken, useValue: repository },
        { provide: ConfigService, useValue: new ConfigService({ uploads: { concurrency: 1 } }) },
      ],
    }).compile();

    service = moduleRef.get(PhotosService);
  });

  afterEach(() => jest.restoreAllMocks());

  describe('uploadPhoto', () => {
    it('stores a valid image with its dimensions', async () => {
      const data = await createPng(3, 2);
      const outcome = await service.uploadPhoto(file('vacation.png', 'image/png', data));

      expect(outcome.success).toBe(true);
      if (!outcome.success) return;

      const stored = await service.getPhotoById(outcome.photo.id);
      expect(stored).not.toBeNull();
      expect(stored?.originalFileName).toBe('vacation.png');
      expect(stored?.mimeType).toBe('image/png');
      expect(stored?.fileSize).toBe(data.length);
      expect(stored?.photoData.equals(data)).toBe(true);
      expect(stored?.width).toBe(3);
      expect(stored?.height).toBe(2);
      expect(stored?.filePath).toBeNull();
      expect(stored?.storedFileName).toMatch(/^[0-9a-f-]{36}\.png$/);
      expect(stored?.storedFileName).not.toBe(`${stored?.id}.png`);
    });

    it('stores images whose dimensions cannot be read', async () => {
      const data = Buffer.from('fake-jpeg-data');
      const outcome = await service.uploadPhoto(file('test-image.jpg', 'image/jpeg', data));

      expect(outcome.success).toBe(true);
      if (!outcome.success) return;
      expect(outcome.photo.width).toBeNull();
      expect(outcome.photo.height).toBeNull();
      expect(outcome.photo.fileSize).toBe(14);
    });

    it('derives the stored extension from the MIME type when the name has none', async () => {
      const outcome = await service.uploadPhoto(
        file('snapshot', 'image/webp', Buffer.from('webp-ish')),
      );

      expect(outcome.success).toBe(true);
      if (!outcome.success) return;
      expect(outcome.photo.storedFileName).toMatch(/\.webp$/);
    });

    it('rejects unsupported types without storing anything', async () => {
      const outcome = await service.uploadPhoto(
        file('test.txt', 'text/plain', Buffer.from('This is not an image')),
      );

      expect(outcome).toEqual({
        success: false,
        fileName: 'test.txt',
        error: UNSUPPORTED_TYPE_MESSAGE,
      });
      await expect(repository.count()).resolves.toBe(0);
    });

    it('rejects files over 10 MiB', async () => {
      const data = Buffer.alloc(11 * 1024 * 1024);
      const outcome = await service.uploadPhoto(file('large-image.jpg', 'image/jpeg', data));

      expect(outcome).toEqual({
        success: false,
        fileName: 'large-image.jpg',
        error: FILE_TOO_LARGE_MESSAGE,
      });
    });

    it('rejects empty files', async () => {
      const outcome = await service.uploadPhoto(file('empty.jpg', 'image/jpeg', Buffer.alloc(0)));

      expect(outcome).toEqual({ success: false, fileName: 'empty.jpg', error: EMPTY_FILE_MESSAGE });
    });
  });

  describe('uploadPhotos', () => {
    it('reports partial success per file', async () => {
      const png = await createPng();
      const result = await service.uploadPhotos([
        file('one.png', 'image/png', png),
        file('notes.txt', 'text/plain', Buffer.from('hello')),
        file('two.png', 'image/png', png),
      ]);

      expect(result.success).toBe(true);
      expect(result.uploadedPhotos.map((p) => p.originalFileName)).toEqual(['one.png', 'two.png']);
      expect(result.failedUploads).toEqual([
        { fileName: 'notes.txt', error: UNSUPPORTED_TYPE_MESSAGE },
      ]);
      await expect(repository.count()).resolves.toBe(2);
    });

    it('is unsuccessful when every file is rejected', async () => {
      const result = await service.uploadPhotos([
        file('document.txt', 'text/plain', Buffer.from('not an image')),
        file('empty.png', 'image/png', Buffer.alloc(0)),
      ]);

      expect(result).toEqual({
        success: false,
        uploadedPhotos: [],
        failedUploads: [
          { fileName: 'document.txt', error: UNSUPPORTED_TYPE_MESSAGE },
          { fileName: 'empty.png', error: EMPTY_FILE_MESSAGE },
        ],
      });
    });

    it('keeps upload order for files stored within the same millisecond', async () => {
      const png = await createPng();
      const names = Array.from({ length: 8 }, (_, i) => `p${i}.png`);
      jest.spyOn(Date, 'now').mockReturnValue(Date.parse('2026-04-01T09:00:00.000Z'));

      await service.uploadPhotos(names.map((name) => file(name, 'image/png', png)));

      const photos = await service.getAllPhotos();
      expect(photos.map((p) => p.originalFileName)).toEqual([...names].reverse());
      expect(new Set(photos.map((p) => p.uploadedAt.getTime())).size).toBe(8);
      await expect(service.getNavigation(photos[3])).resolves.toEqual({
        previousPhotoId: photos[4].id,
        nextPhotoId: photos[2].id,
      });
    });

    it('attempts every file and then fails when storage is down', async () => {
      const save = jest
        .spyOn(repository, 'save')
        .mockRejectedValueOnce(new Error('connection refused'));
      const png = await createPng();

      await expect(
        service.uploadPhotos([file('a.png', 'image/png', png), file('b.png', 'image/png', png)]),
      ).rejects.toThrow("Batch operation 'uploadPhotos' had 1 failures out of 2 items");
      expect(save).toHaveBeenCalledTimes(2);
    });
  });

  describe('browsing', () => {
    it('lists photos in reverse upload order', async () => {
      const png = await createPng();
      await service.uploadPhoto(file('photo1.png', 'image/png', png));
      await sleep(15);
      await service.uploadPhoto(file('photo2.png', 'image/png', png));
      await sleep(15);
      await service.uploadPhoto(file('photo3.png', 'image/png', png));

      const photos = await service.getAllPhotos();
      expect(photos.map((p) => p.originalFileName)).toEqual([
        'photo3.png',
        'photo2.png',
        'photo1.png',
      ]);
    });

    it('navigates to the nearest older and newer photos', async () => {
      const data = Buffer.from('data');
      const base = { storedFileName: 'x', mimeType: 'image/png', photoData: data };
      const oldest = await repository.save({
        ...base,
        originalFileName: 'oldest',
        uploadedAt: at('2026-01-01T00:00:00.000Z'),
      });
      const middle = await repository.save({
        ...base,
        originalFileName: 'middle',
        uploadedAt: at('2026-01-02T00:00:00.000Z'),
      });
      const newest = await repository.save({
        ...base,
        originalFileName: 'newest',
        uploadedAt: at('2026-01-03T00:00:00.000Z'),
      });

      await expect(service.getNavigation(middle)).resolves.toEqual({
        previousPhotoId: oldest.id,
        nextPhotoId: newest.id,
      });
      await expect(service.getPreviousPhoto(oldest)).resolves.toBeNull();
      await expect(service.getNextPhoto(newest)).resolves.toBeNull();
      await expect(repository.findBefore(middle.uploadedAt)).resolves.toMatchObject({
        id: oldest.id,
      });
      await expect(repository.findAfter(middle.uploadedAt)).resolves.toMatchObject({
        id: newest.id,
      });
    });

    it('breaks timestamp collisions by id', async () => {
      const uploadedAt = at('2026-02-01T12:00:00.000Z');
      const base = {
        storedFileName: 'x',
        mimeType: 'image/png',
        photoData: Buffer.from('data'),
        uploadedAt,
      };
      const low = await repository.save({
        ...base,
        id: '00000000-0000-4000-8000-000000000001',
        originalFileName: 'low',
      });
      const high = await repository.save({
        ...base,
        id: '00000000-0000-4000-8000-000000000002',
        originalFileName: 'high',
      });

      const photos = await service.getAllPhotos();
      expect(photos.map((p) => p.id)).toEqual([high.id, low.id]);
      await expect(service.getNavigation(high)).resolves.toEqual({
        previousPhotoId: low.id,
        nextPhotoId: null,
      });
      await expect(service.getNavigation(low)).resolves.toEqual({
        previousPhotoId: null,
        nextPhotoId: high.id,
      });
    });

    it('pages through the gallery without overlap', async () => {
      for (let i = 1; i <= 5; i++) {
        await repository.save({
          originalFileName: `photo${i}.jpg`,
          storedFileName: `stored-${i}.jpg`,
          mimeType: 'image/jpeg',
          photoData: Buffer.from(`data-${i}`),
          uploadedAt: at(`2026-01-0${i}T00:00:00.000Z`),
        });
      }

      const first = await service.getPage(2, 0);
      const second = await service.getPage(2, 2);
      const all = await service.getAllPhotos();

      expect(first.total).toBe(5);
      expect(first.photos.map((p) => p.originalFileName)).toEqual(['photo5.jpg', 'photo4.jpg']);
      expect(second.photos.map((p) => p.originalFileName)).toEqual(['photo3.jpg', 'photo2.jpg']);
      expect([...first.photos, ...second.photos].map((p) => p.id)).toEqual(
        all.slice(0, 4).map((p) => p.id),
      );
    });

    it('treats a blank id as not found', async () => {
      await expect(service.getPhotoById('   ')).resolves.toBeNull();
    });
  });

  describe('deletePhoto', () => {
    it('removes an existing photo', async () => {
      const outcome = await service.uploadPhoto(
        file('to-delete.png', 'image/png', await createPng()),
      );
      if (!outcome.success) throw new Error('upload failed');

      await expect(service.deletePhoto(outcome.photo.id)).resolves.toBe(true);
      await expect(service.getPhotoById(outcome.photo.id)).resolves.toBeNull();
    });

    it('reports unknown ids without throwing', async () => {
      await expect(service.deletePhoto('non-existent-id')).resolves.toBe(false);
      await expect(service.deletePhoto(' ')).resolves.toBe(false);
    });
  });
});
