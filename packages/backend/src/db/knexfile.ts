import { fileURLToPath } from 'node:url';
import type { Knex } from 'knex';
import { config as appConfig } from '../config.js';

const config: Knex.Config = {
  client: 'mysql2',
  connection: {
    host: appConfig.db.host,
    port: appConfig.db.port,
    user: appConfig.db.user,
    password: appConfig.db.password,
    database: appConfig.db.database,
    timezone: 'Z',
  },
  migrations: {
    directory: fileURLToPath(new URL('./migrations', import.meta.url)),
    extension: 'ts',
    loadExtensions: ['.ts'],
    tableName: 'knex_migrations',
  },
  pool: {
    min: 2,
    max: 10,
  },
};

export default config;
