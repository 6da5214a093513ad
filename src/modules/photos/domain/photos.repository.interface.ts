import type { NewPhoto, Photo } from './entities/photo.entity';

/**
 * Sole owner of persisted photos. Lookups that miss return `null` or `false`;
 * only storage failures reject.
 */
export interface IPhotosRepository {
  save(photo: NewPhoto): Promise<Photo>;
  findById(id: string): Promise<Photo | null>;
  /** Newest first; ties broken by id descending. */
  listAll(): Promise<Photo[]>;
  /** Same order as `listAll()`. */
  findPage(limit: number, offset: number): Promise<Photo[]>;
  /**
   * Nearest older photo. With `id`, a photo sharing the timestamp but with a
   * smaller id also counts as older.
   */
  findBefore(uploadedAt: Date, id?: string): Promise<Photo | null>;
  /** Nearest newer photo, mirroring `findBefore`. */
  findAfter(uploadedAt: Date, id?: string): Promise<Photo | null>;
  delete(id: string): Promise<boolean>;
  count(): Promise<number>;
}

export const IPhotosRepositoryToken = Symbol('IPhotosRepository');
