import { registerAs } from '@nestjs/config';

export type DatabaseEngine = 'postgres' | 'sqljs';

export interface DatabaseConfig {
  type: DatabaseEngine;
  // SQLite file the sql.js database is loaded from and saved to, or ':memory:'
  path: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: string;
  ssl: boolean;
  logging: boolean;
}

export const databaseConfig = registerAs(
  'database',
  (): DatabaseConfig => ({
    type: process.env.DB_TYPE === 'postgres' ? 'postgres' : 'sqljs',
    path: process.env.DB_PATH || 'data/listings.db',
    host: process.env.DB_HOST,
    port: process.env.DB_PORT ? parseInt(process.env.DB_PORT, 10) : undefined,
    username: process.env.DB_USERNAME,
    password: process.env.DB_PASSWORD,
    database: process.env.DB_DATABASE,
    ssl: process.env.DB_SSL === 'true',
    logging: process.env.DB_LOGGING === 'true',
  }),
);
