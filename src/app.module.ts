// src/app.module.ts
import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import databaseConfig from './config/database.config';
import ledgerConfig, { loadLedgerConfig } from './config/ledger.config';
import { LedgerModule } from './ledger/ledger.module';

// The store driver decides which modules exist, so it is read from the
// process environment before the container is built.
const { store } = loadLedgerConfig();

const persistenceImports: DynamicModule[] =
  store === 'postgres'
    ? [
        TypeOrmModule.forRootAsync({
          imports: [ConfigModule],
          useFactory: (configService: ConfigService) => {
            const dbConfig =
              configService.get<TypeOrmModuleOptions>('database');
            if (!dbConfig) {
              throw new Error('Database configuration is missing');
            }
            return dbConfig;
          },
          inject: [ConfigService],
        }),
      ]
    : [];

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, ledgerConfig],
      envFilePath: ['.env.local', '.env'],
    }),
    ...persistenceImports,
    LedgerModule.forRoot(store),
  ],
})
export class AppModule {}
