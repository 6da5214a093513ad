import { Module } from '@nestjs/common';
import { PhotosController } from '../interfaces/controllers/photos.controller';
import { PhotosService } from '../application/photos.service';
import { PhotoMetadataService } from '../application/photo-metadata.service';
import { PhotosRepositoryInterfaces } from './index.interface';

@Module({
  controllers: [PhotosController],
  providers: [PhotosService, PhotoMetadataService, ...PhotosRepositoryInterfaces],
  exports: [PhotosService],
})
export class PhotosModule {}
