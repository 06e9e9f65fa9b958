import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, QueryFailedError, Repository } from 'typeorm';
import ledgerConfig, { LedgerConfig } from '../../config/ledger.config';
import {
  Account,
  ACCOUNT_PK,
  ACCOUNT_USERNAME_UNIQUE,
} from '../entities/account.entity';
import { HistoryEntry, HISTORY_ENTRY_PK } from '../entities/history-entry.entity';
import { AccountNotFoundException } from '../exceptions/account-not-found.exception';
import { BusyException } from '../exceptions/busy.exception';
import { DuplicateUsernameException } from '../exceptions/duplicate-username.exception';
import { IdentifierCollisionException } from '../exceptions/identifier-collision.exception';
import { LedgerException } from '../exceptions/ledger.exception';
import { StorageFailureException } from '../exceptions/storage-failure.exception';
import { AccountNumber, TransactionId, lockOrder } from '../ledger.types';
import { LedgerStore, LedgerTransaction } from './ledger-store.interface';

/** Postgres SQLSTATE codes the store reacts to */
const PG_UNIQUE_VIOLATION = '23505';
const PG_LOCK_NOT_AVAILABLE = '55P03';
const PG_DEADLOCK_DETECTED = '40P01';
const PG_SERIALIZATION_FAILURE = '40001';

interface PgErrorFields {
  code?: string;
  constraint?: string;
}

function pgErrorFields(error: QueryFailedError): PgErrorFields {
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return {};
  }
  const fields: PgErrorFields = {};
  if ('code' in driverError && typeof driverError.code === 'string') {
    fields.code = driverError.code;
  }
  if ('constraint' in driverError && typeof driverError.constraint === 'string') {
    fields.constraint = driverError.constraint;
  }
  return fields;
}

/**
 * Maps whatever escaped a transaction to the ledger's error taxonomy.
 * Ledger exceptions raised by the callback pass through untouched.
 */
export function translateStorageError(
  error: unknown,
  subject?: { accountNumber?: AccountNumber; transactionId?: TransactionId; username?: string },
): LedgerException {
  if (error instanceof LedgerException) {
    return error;
  }
  if (error instanceof QueryFailedError) {
    const { code, constraint } = pgErrorFields(error);
    switch (code) {
      case PG_LOCK_NOT_AVAILABLE:
      case PG_DEADLOCK_DETECTED:
      case PG_SERIALIZATION_FAILURE:
        return new BusyException('Account is locked by another operation', error);
      case PG_UNIQUE_VIOLATION:
        if (constraint === ACCOUNT_USERNAME_UNIQUE) {
          return new DuplicateUsernameException(subject?.username ?? 'unknown');
        }
        if (constraint === ACCOUNT_PK) {
          return new IdentifierCollisionException(
            'account number',
            subject?.accountNumber ?? 0,
            error,
          );
        }
        if (constraint === HISTORY_ENTRY_PK) {
          return new IdentifierCollisionException(
            'transaction id',
            subject?.transactionId ?? 0,
            error,
          );
        }
        break;
    }
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new StorageFailureException(`Ledger storage failed: ${reason}`, error);
}

class TypeOrmLedgerTransaction implements LedgerTransaction {
  constructor(private readonly manager: EntityManager) {}

  findAccountByNumber(accountNumber: AccountNumber): Promise<Account | null> {
    return this.manager.findOne(Account, { where: { accountNumber } });
  }

  accountNumberExists(accountNumber: AccountNumber): Promise<boolean> {
    return this.manager.existsBy(Account, { accountNumber });
  }

  usernameExists(username: string): Promise<boolean> {
    return this.manager.existsBy(Account, { username });
  }

  transactionIdExists(transactionId: TransactionId): Promise<boolean> {
    return this.manager.existsBy(HistoryEntry, { transactionId });
  }

  async saveAccount(account: Account): Promise<Account> {
    if (account.version === undefined) {
      try {
        await this.manager.insert(Account, { ...account, version: 1 });
      } catch (error) {
        throw translateStorageError(error, account);
      }
      return Object.assign(new Account(), account, { version: 1 });
    }

    const version = account.version + 1;
    const result = await this.manager.update(
      Account,
      { accountNumber: account.accountNumber, version: account.version },
      { balance: account.balance, version },
    );
    if (result.affected !== 1) {
      // The row is locked for the whole scope, so this means it vanished.
      throw new AccountNotFoundException(account.accountNumber);
    }
    return Object.assign(new Account(), account, { version });
  }

  async appendHistory(entry: HistoryEntry): Promise<void> {
    try {
      await this.manager.insert(HistoryEntry, entry);
    } catch (error) {
      throw translateStorageError(error, entry);
    }
  }
}

/**
 * Postgres-backed LedgerStore. Each scope is one READ COMMITTED
 * transaction holding `SELECT ... FOR UPDATE` locks on its accounts.
 */
@Injectable()
export class TypeOrmLedgerStore implements LedgerStore {
  private readonly logger = new Logger(TypeOrmLedgerStore.name);

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(Account)
    private readonly accountRepository: Repository<Account>,
    @InjectRepository(HistoryEntry)
    private readonly historyRepository: Repository<HistoryEntry>,
    @Inject(ledgerConfig.KEY)
    private readonly config: LedgerConfig,
  ) {}

  async withAccountLock<R>(
    accountNumbers: Iterable<AccountNumber>,
    fn: (tx: LedgerTransaction) => Promise<R>,
  ): Promise<R> {
    const ordered = lockOrder(accountNumbers);
    try {
      return await this.dataSource.transaction(
        'READ COMMITTED',
        async (manager) => {
          // SET does not take bind parameters; the value is a validated integer.
          await manager.query(
            `SET LOCAL lock_timeout = ${Math.trunc(this.config.lockTimeoutMs)}`,
          );
          for (const accountNumber of ordered) {
            await manager.findOne(Account, {
              where: { accountNumber },
              lock: { mode: 'pessimistic_write' },
            });
          }
          return fn(new TypeOrmLedgerTransaction(manager));
        },
      );
    } catch (error) {
      const translated = translateStorageError(error);
      if (translated instanceof BusyException) {
        this.logger.warn(
          `Accounts [${ordered.join(', ')}] busy: ${translated.message}`,
        );
      } else if (translated instanceof StorageFailureException) {
        this.logger.error(
          `Scope on accounts [${ordered.join(', ')}] failed: ${translated.message}`,
        );
      }
      throw translated;
    }
  }

  async findAccountByCredentials(
    username: string,
    password: string,
  ): Promise<Account | null> {
    try {
      return await this.accountRepository.findOne({
        where: { username, password },
      });
    } catch (error) {
      throw translateStorageError(error);
    }
  }

  async findAccountByNumber(
    accountNumber: AccountNumber,
  ): Promise<Account | null> {
    try {
      return await this.accountRepository.findOne({ where: { accountNumber } });
    } catch (error) {
      throw translateStorageError(error);
    }
  }

  async accountNumberExists(accountNumber: AccountNumber): Promise<boolean> {
    try {
      return await this.accountRepository.existsBy({ accountNumber });
    } catch (error) {
      throw translateStorageError(error);
    }
  }

  async usernameExists(username: string): Promise<boolean> {
    try {
      return await this.accountRepository.existsBy({ username });
    } catch (error) {
      throw translateStorageError(error);
    }
  }

  async transactionIdExists(transactionId: TransactionId): Promise<boolean> {
    try {
      return await this.historyRepository.existsBy({ transactionId });
    } catch (error) {
      throw translateStorageError(error);
    }
  }

  async historyForAccount(
    accountNumber: AccountNumber,
  ): Promise<HistoryEntry[]> {
    try {
      return await this.historyRepository.find({
        where: { accountNumber },
        order: { timestamp: 'DESC' },
      });
    } catch (error) {
      throw translateStorageError(error);
    }
  }
}
