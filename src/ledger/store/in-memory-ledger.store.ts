import { Inject, Injectable, Logger } from '@nestjs/common';
import ledgerConfig, { LedgerConfig } from '../../config/ledger.config';
import { Account } from '../entities/account.entity';
import { HistoryEntry } from '../entities/history-entry.entity';
import { AccountNotFoundException } from '../exceptions/account-not-found.exception';
import { BusyException } from '../exceptions/busy.exception';
import { DuplicateUsernameException } from '../exceptions/duplicate-username.exception';
import { IdentifierCollisionException } from '../exceptions/identifier-collision.exception';
import { AccountNumber, TransactionId, lockOrder } from '../ledger.types';
import { KeyedLock, Release } from './keyed-lock';
import { LedgerStore, LedgerTransaction } from './ledger-store.interface';

function cloneAccount(account: Account): Account {
  const copy = new Account();
  copy.accountNumber = account.accountNumber;
  copy.name = account.name;
  copy.username = account.username;
  copy.password = account.password;
  copy.transactionPin = account.transactionPin;
  copy.balance = account.balance;
  copy.version = account.version;
  copy.openedAt = new Date(account.openedAt.getTime());
  return copy;
}

function cloneEntry(entry: HistoryEntry): HistoryEntry {
  const copy = new HistoryEntry();
  copy.transactionId = entry.transactionId;
  copy.accountNumber = entry.accountNumber;
  copy.type = entry.type;
  copy.amount = entry.amount;
  copy.timestamp = new Date(entry.timestamp.getTime());
  return copy;
}

/** Committed ledger state shared by every transaction of one store */
class LedgerState {
  readonly accounts = new Map<AccountNumber, Account>();
  readonly history = new Map<AccountNumber, HistoryEntry[]>();
  readonly transactionIds = new Set<TransactionId>();

  usernameOwner(username: string): AccountNumber | undefined {
    for (const account of this.accounts.values()) {
      if (account.username === username) {
        return account.accountNumber;
      }
    }
    return undefined;
  }
}

/**
 * Write set of one consistency scope. Reads fall through to committed
 * state; nothing reaches that state until {@link commit}.
 */
class InMemoryLedgerTransaction implements LedgerTransaction {
  private readonly stagedAccounts = new Map<AccountNumber, Account>();
  private readonly inserted = new Set<AccountNumber>();
  private readonly stagedEntries: HistoryEntry[] = [];

  constructor(private readonly state: LedgerState) {}

  async findAccountByNumber(
    accountNumber: AccountNumber,
  ): Promise<Account | null> {
    const account =
      this.stagedAccounts.get(accountNumber) ??
      this.state.accounts.get(accountNumber);
    return account ? cloneAccount(account) : null;
  }

  async accountNumberExists(accountNumber: AccountNumber): Promise<boolean> {
    return (
      this.stagedAccounts.has(accountNumber) ||
      this.state.accounts.has(accountNumber)
    );
  }

  async usernameExists(username: string): Promise<boolean> {
    for (const account of this.stagedAccounts.values()) {
      if (account.username === username) {
        return true;
      }
    }
    return this.state.usernameOwner(username) !== undefined;
  }

  async transactionIdExists(transactionId: TransactionId): Promise<boolean> {
    return (
      this.state.transactionIds.has(transactionId) ||
      this.stagedEntries.some((entry) => entry.transactionId === transactionId)
    );
  }

  async saveAccount(account: Account): Promise<Account> {
    const isNew = account.version === undefined;
    const current =
      this.stagedAccounts.get(account.accountNumber) ??
      this.state.accounts.get(account.accountNumber);

    if (isNew && current) {
      throw new IdentifierCollisionException(
        'account number',
        account.accountNumber,
      );
    }
    if (!isNew && !current) {
      throw new AccountNotFoundException(account.accountNumber);
    }

    const stored = cloneAccount(account);
    stored.version = (current?.version ?? 0) + 1;
    if (isNew) {
      this.inserted.add(stored.accountNumber);
    }
    this.stagedAccounts.set(stored.accountNumber, stored);
    return cloneAccount(stored);
  }

  async appendHistory(entry: HistoryEntry): Promise<void> {
    if (!(await this.accountNumberExists(entry.accountNumber))) {
      throw new AccountNotFoundException(entry.accountNumber);
    }
    if (await this.transactionIdExists(entry.transactionId)) {
      throw new IdentifierCollisionException(
        'transaction id',
        entry.transactionId,
      );
    }
    this.stagedEntries.push(cloneEntry(entry));
  }

  /**
   * Re-checks uniqueness against state committed since the writes were
   * staged, then applies everything in one synchronous step.
   */
  commit(): void {
    for (const accountNumber of this.inserted) {
      if (this.state.accounts.has(accountNumber)) {
        throw new IdentifierCollisionException('account number', accountNumber);
      }
    }
    for (const account of this.stagedAccounts.values()) {
      const owner = this.state.usernameOwner(account.username);
      if (owner !== undefined && owner !== account.accountNumber) {
        throw new DuplicateUsernameException(account.username);
      }
    }
    for (const entry of this.stagedEntries) {
      if (this.state.transactionIds.has(entry.transactionId)) {
        throw new IdentifierCollisionException(
          'transaction id',
          entry.transactionId,
        );
      }
    }

    for (const account of this.stagedAccounts.values()) {
      this.state.accounts.set(account.accountNumber, account);
    }
    for (const entry of this.stagedEntries) {
      const entries = this.state.history.get(entry.accountNumber) ?? [];
      entries.push(entry);
      this.state.history.set(entry.accountNumber, entries);
      this.state.transactionIds.add(entry.transactionId);
    }
  }
}

/**
 * Process-local LedgerStore. Each account has a FIFO lock; a scope holds
 * the locks of every account it touches until it commits or rolls back.
 */
@Injectable()
export class InMemoryLedgerStore implements LedgerStore {
  private readonly logger = new Logger(InMemoryLedgerStore.name);
  private readonly state = new LedgerState();
  private readonly locks = new KeyedLock();

  constructor(
    @Inject(ledgerConfig.KEY)
    private readonly config: LedgerConfig,
  ) {}

  async withAccountLock<R>(
    accountNumbers: Iterable<AccountNumber>,
    fn: (tx: LedgerTransaction) => Promise<R>,
  ): Promise<R> {
    const release = await this.acquireLocks(lockOrder(accountNumbers));
    try {
      const tx = new InMemoryLedgerTransaction(this.state);
      const result = await fn(tx);
      tx.commit();
      return result;
    } catch (error) {
      this.logger.debug(`Rolled back scope: ${String(error)}`);
      throw error;
    } finally {
      release();
    }
  }

  private async acquireLocks(ordered: AccountNumber[]): Promise<Release> {
    try {
      return await this.locks.acquireAll(ordered, this.config.lockTimeoutMs);
    } catch (error) {
      if (error instanceof BusyException) {
        this.logger.warn(
          `Accounts [${ordered.join(', ')}] busy: ${error.message}`,
        );
      }
      throw error;
    }
  }

  async findAccountByCredentials(
    username: string,
    password: string,
  ): Promise<Account | null> {
    for (const account of this.state.accounts.values()) {
      if (account.username === username && account.password === password) {
        return cloneAccount(account);
      }
    }
    return null;
  }

  async findAccountByNumber(
    accountNumber: AccountNumber,
  ): Promise<Account | null> {
    const account = this.state.accounts.get(accountNumber);
    return account ? cloneAccount(account) : null;
  }

  async accountNumberExists(accountNumber: AccountNumber): Promise<boolean> {
    return this.state.accounts.has(accountNumber);
  }

  async usernameExists(username: string): Promise<boolean> {
    return this.state.usernameOwner(username) !== undefined;
  }

  async transactionIdExists(transactionId: TransactionId): Promise<boolean> {
    return this.state.transactionIds.has(transactionId);
  }

  async historyForAccount(
    accountNumber: AccountNumber,
  ): Promise<HistoryEntry[]> {
    const entries = this.state.history.get(accountNumber) ?? [];
    return entries
      .map(cloneEntry)
      .reverse()
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }
}
