import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseMigrationsService } from './database-migrations.service';
import { PgPoolService } from './pg-pool.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [PgPoolService, DatabaseMigrationsService],
  exports: [PgPoolService],
})
export class DatabaseModule {}
