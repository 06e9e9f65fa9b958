// src/config/database.config.ts
import { registerAs } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { Account } from '../ledger/entities/account.entity';
import { HistoryEntry } from '../ledger/entities/history-entry.entity';
import { positiveInt } from './ledger.config';

const DEFAULT_POOL_SIZE = 10;

/**
 * Postgres connection options for the `postgres` store driver. One setting,
 * DB_POOL_SIZE, sizes the pg pool; every open ledger scope holds one client.
 */
export function loadDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env,
): TypeOrmModuleOptions {
  return {
    type: 'postgres',
    host: env.DB_HOST || 'localhost',
    port: positiveInt(env.DB_PORT, 5432),
    username: env.DB_USER || 'postgres',
    password: env.DB_PASSWORD || 'postgres',
    database: env.DB_NAME || 'ledger',
    applicationName: 'ledger-service',

    entities: [Account, HistoryEntry],

    // Schema sync is off in production
    synchronize: env.NODE_ENV !== 'production',

    logging: env.NODE_ENV === 'development' ? ['query', 'error'] : ['error'],

    extra: {
      max: positiveInt(env.DB_POOL_SIZE, DEFAULT_POOL_SIZE),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },

    retryAttempts: 10,
    retryDelay: 3000,
  };
}

export default registerAs('database', (): TypeOrmModuleOptions =>
  loadDatabaseConfig(),
);
