import type { Knex } from 'knex';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '../src/config.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Migrations run as the owning user; the service itself only reads through DATABASE_READONLY_URL
const { database } = loadConfig();

const migrations: Knex.MigratorConfig = {
  directory: resolve(__dirname, 'migrations'),
  extension: 'ts',
};

const config: Record<string, Knex.Config> = {
  development: {
    client: 'pg',
    connection: database.url,
    migrations,
    pool: { min: 2, max: 10 },
  },
  production: {
    client: 'pg',
    connection: database.url,
    migrations,
    pool: { min: 2, max: 20 },
  },
};

export default config;
