import { engineConfigFromEnv } from '@claimsentry/shared';

export const config = {
  port: parseInt(process.env.PORT ?? '3000', 10),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL ?? 'info',

  db: {
    host: process.env.DB_HOST ?? '127.0.0.1',
    port: parseInt(process.env.DB_PORT ?? '13306', 10),
    user: process.env.DB_USER ?? 'root',
    password: process.env.DB_PASSWORD ?? 'root_dev',
    database: process.env.DB_NAME ?? 'claimsentry',
  },

  // Unset values fall back to the engine defaults; the engine validates ranges.
  rules: engineConfigFromEnv(process.env),

  batchMaxItems: parseInt(process.env.BATCH_MAX_ITEMS ?? '500', 10),
  corsOrigins: (process.env.CORS_ORIGINS ?? 'http://localhost:5173').split(',').map(s => s.trim()),
} as const;
