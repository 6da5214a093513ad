import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { runMigrations } from './migrations';
import { PgPoolService } from './pg-pool.service';

@Injectable()
export class DatabaseMigrationsService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseMigrationsService.name);

  constructor(
    private readonly pgPool: PgPoolService,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit() {
    if (this.configService.get<boolean>('database.migrateOnStart') === false) {
      this.logger.log('Skipping migrations on start');
      return;
    }

    const result = await runMigrations(this.pgPool.client, 'up', this.logger);
    if (result.applied.length > 0) {
      this.logger.log(`Applied ${result.applied.length} migration(s)`);
    }
  }
}
