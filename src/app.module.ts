import { Module } from '@nestjs/common';
import { ConfigModule } from './modules/config/infrastructure/config.module';
import { DatabaseModule } from './modules/database/infrastructure/database.module';
import { PhotosModule } from './modules/photos/infrastructure/photos.module';

@Module({
  imports: [ConfigModule, DatabaseModule, PhotosModule],
})
export class AppModule {}
