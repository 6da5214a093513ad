const toInt = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const toBool = (value: string | undefined, fallback: boolean) => {
  if (value === undefined || value === '') return fallback;
  return value === 'true' || value === '1';
};

const configuration = () => {
  const isProduction = process.env.NODE_ENV === 'production';

  return {
    app: {
      port: toInt(process.env.PORT, 3000),
      logLevel: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
    },
    database: {
      url: process.env.DATABASE_URL,
      ssl: toBool(process.env.DATABASE_SSL, false),
      poolMax: toInt(process.env.DATABASE_POOL_MAX, 10),
      migrateOnStart: toBool(process.env.DATABASE_MIGRATE_ON_START, true),
    },
    cors: {
      origin: process.env.CORS_ORIGIN || '*',
    },
    uploads: {
      maxFiles: toInt(process.env.UPLOAD_MAX_FILES, 20),
      concurrency: toInt(process.env.UPLOAD_CONCURRENCY, 1),
    },
  };
};

export type AppConfiguration = ReturnType<typeof configuration>;

export default configuration;
