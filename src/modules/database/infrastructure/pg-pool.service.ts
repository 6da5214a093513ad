import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg';

export const buildPoolConfig = (
  databaseUrl: string,
  options: { ssl?: boolean; max?: number } = {},
): PoolConfig => ({
  connectionString: databaseUrl,
  ssl: options.ssl ? { rejectUnauthorized: false } : false,
  max: options.max ?? 10,
  idleTimeoutMillis: 30000, // Close idle connections after 30s
  connectionTimeoutMillis: 10000, // Fail if can't connect in 10s
});

@Injectable()
export class PgPoolService implements OnModuleDestroy {
  private readonly logger = new Logger(PgPoolService.name);
  private readonly pool: Pool;

  constructor(private readonly configService: ConfigService) {
    const databaseUrl = this.configService.get<string>('database.url');
    if (!databaseUrl) {
      throw new Error('DATABASE_URL is not configured');
    }

    const ssl = this.configService.get<boolean>('database.ssl') ?? false;
    const max = this.configService.get<number>('database.poolMax') ?? 10;

    this.logger.log(`Database pool: ssl=${ssl}, max=${max}`);

    this.pool = new Pool(buildPoolConfig(databaseUrl, { ssl, max }));
    this.pool.on('error', (error) => {
      this.logger.error('Idle database client error', error.stack);
    });
  }

  get client(): Pool {
    return this.pool;
  }

  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>> {
    return this.pool.query<R>(text, values);
  }

  async onModuleDestroy() {
    await this.pool.end();
    this.logger.log('Database pool closed');
  }
}
