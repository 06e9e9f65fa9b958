import { Account } from '../entities/account.entity';
import { HistoryEntry } from '../entities/history-entry.entity';
import { AccountNumber, TransactionId } from '../ledger.types';

export const LEDGER_STORE = Symbol('LEDGER_STORE');

/** Lookups available both on the store and inside a consistency scope */
export interface LedgerReader {
  findAccountByNumber(accountNumber: AccountNumber): Promise<Account | null>;
  accountNumberExists(accountNumber: AccountNumber): Promise<boolean>;
  usernameExists(username: string): Promise<boolean>;
  transactionIdExists(transactionId: TransactionId): Promise<boolean>;
}

/**
 * Transactional view handed to the callback of
 * {@link LedgerStore.withAccountLock}. Writes become visible to other
 * operations only when the callback returns.
 */
export interface LedgerTransaction extends LedgerReader {
  /**
   * Inserts the account when it has no version yet, otherwise writes its
   * balance and bumps the version. Resolves with the account as stored.
   */
  saveAccount(account: Account): Promise<Account>;
  appendHistory(entry: HistoryEntry): Promise<void>;
}

export interface LedgerStore extends LedgerReader {
  /**
   * Locks the given accounts in ascending account-number order, runs `fn`
   * against a transactional view, commits when it resolves and rolls back
   * when it rejects. Rejects with BusyException when a lock is not granted
   * within the configured wait.
   */
  withAccountLock<R>(
    accountNumbers: Iterable<AccountNumber>,
    fn: (tx: LedgerTransaction) => Promise<R>,
  ): Promise<R>;

  findAccountByCredentials(
    username: string,
    password: string,
  ): Promise<Account | null>;

  /** Newest first */
  historyForAccount(accountNumber: AccountNumber): Promise<HistoryEntry[]>;
}
