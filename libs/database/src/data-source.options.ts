import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { DataSourceOptions } from 'typeorm';
import { DatabaseConfig } from './database.config';
import { ListingEntity } from './entities';
import { migrations } from './migrations';

export const entities = [ListingEntity];

export function buildDataSourceOptions(config: DatabaseConfig): DataSourceOptions {
  const common = {
    entities,
    migrations,
    migrationsRun: true,
    synchronize: false,
    logging: config.logging,
  };

  if (config.type === 'sqljs') {
    if (config.path === ':memory:') {
      return { ...common, type: 'sqljs' };
    }
    mkdirSync(dirname(config.path), { recursive: true });
    return { ...common, type: 'sqljs', location: config.path, autoSave: true };
  }

  const { host, port, username, password, database } = config;
  if (!host || !port || !username || !password || !database) {
    const missing = Object.entries({
      DB_HOST: host,
      DB_PORT: port,
      DB_USERNAME: username,
      DB_PASSWORD: password,
      DB_DATABASE: database,
    })
      .filter(([, value]) => !value)
      .map(([name]) => name);
    throw new Error(`Missing required environment variable: ${missing.join(', ')}`);
  }

  return {
    ...common,
    type: 'postgres',
    host,
    port,
    username,
    password,
    database,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
  };
}
