// src/ledger/ledger.module.ts
import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';

import ledgerConfig, { LedgerStoreDriver } from '../config/ledger.config';
import { Account } from './entities/account.entity';
import { HistoryEntry } from './entities/history-entry.entity';
import { LedgerController } from './ledger.controller';
import { LedgerService } from './ledger.service';
import {
  IdentifierAllocator,
  RANDOM_SOURCE,
  cryptoRandomSource,
} from './services/identifier-allocator.service';
import { LedgerClock } from './services/ledger-clock.service';
import { RetryStrategy } from './services/retry-strategy.service';
import { InMemoryLedgerStore } from './store/in-memory-ledger.store';
import { LEDGER_STORE } from './store/ledger-store.interface';
import { TypeOrmLedgerStore } from './store/typeorm-ledger.store';

@Module({})
export class LedgerModule {
  /**
   * Binds LEDGER_STORE to the Postgres store or the in-process one.
   */
  static forRoot(driver: LedgerStoreDriver): DynamicModule {
    const storeProvider: Provider =
      driver === 'postgres'
        ? { provide: LEDGER_STORE, useClass: TypeOrmLedgerStore }
        : { provide: LEDGER_STORE, useClass: InMemoryLedgerStore };

    return {
      module: LedgerModule,
      imports: [
        ConfigModule.forFeature(ledgerConfig),
        ...(driver === 'postgres'
          ? [TypeOrmModule.forFeature([Account, HistoryEntry])]
          : []),
      ],
      controllers: [LedgerController],
      providers: [
        LedgerService,
        IdentifierAllocator,
        RetryStrategy,
        LedgerClock,
        { provide: RANDOM_SOURCE, useValue: cryptoRandomSource },
        storeProvider,
      ],
      exports: [LedgerService],
    };
  }
}
