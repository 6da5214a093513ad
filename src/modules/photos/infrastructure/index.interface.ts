import { PhotosRepository } from './database/repositories/photos.repository';
import { IPhotosRepositoryToken } from '../domain/photos.repository.interface';

export const PhotosRepositoryInterfaces = [
  {
    provide: IPhotosRepositoryToken,
    useClass: PhotosRepository,
  },
];
