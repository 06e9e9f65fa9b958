// src/ledger/ledger.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { Decimal } from 'decimal.js';

import ledgerConfig, { LedgerConfig } from '../config/ledger.config';
import { Account } from './entities/account.entity';
import {
  HistoryEntry,
  HistoryEntryType,
} from './entities/history-entry.entity';
import { AccountNotFoundException } from './exceptions/account-not-found.exception';
import { AuthenticationFailedException } from './exceptions/authentication-failed.exception';
import { DuplicateUsernameException } from './exceptions/duplicate-username.exception';
import { IdentifierCollisionException } from './exceptions/identifier-collision.exception';
import { InsufficientFundsException } from './exceptions/insufficient-funds.exception';
import { InvalidInputException } from './exceptions/invalid-input.exception';
import { ResourceExhaustedException } from './exceptions/resource-exhausted.exception';
import {
  AccountNumber,
  OpenAccountCommand,
  TransactionId,
  TransferResult,
  isAccountNumber,
} from './ledger.types';
import {
  MAX_MONEY,
  MoneyInput,
  exceedsMoneyLimit,
  formatMoney,
  toMoney,
} from './money';
import { IdentifierAllocator } from './services/identifier-allocator.service';
import { LedgerClock } from './services/ledger-clock.service';
import { RetryPolicy, RetryStrategy } from './services/retry-strategy.service';
import {
  LEDGER_STORE,
  LedgerStore,
  LedgerTransaction,
} from './store/ledger-store.interface';

const PIN_PATTERN = /^\d{4}$/;

/**
 * Business facade of the ledger: opening accounts, moving money and
 * reading balances and history.
 *
 * Every mutation runs inside one `withAccountLock` scope of the store, so
 * the read-modify-write of a balance and the history entries it produces
 * commit together or not at all. Validation happens before any scope is
 * opened. The service keeps no state of its own between calls.
 */
@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);

  /** Reruns a mutation whose freshly drawn identifier lost a race */
  private readonly collisionPolicy: RetryPolicy = {
    isRetryable: (error) => error instanceof IdentifierCollisionException,
    exhausted: (attempts) =>
      new ResourceExhaustedException(
        `Identifier allocation kept colliding after ${attempts} attempts`,
      ),
  };

  constructor(
    @Inject(LEDGER_STORE)
    private readonly store: LedgerStore,
    private readonly allocator: IdentifierAllocator,
    private readonly retryStrategy: RetryStrategy,
    private readonly clock: LedgerClock,
    @Inject(ledgerConfig.KEY)
    private readonly config: LedgerConfig,
  ) {}

  /**
   * Looks up the account whose username and password both match exactly.
   */
  async login(username: string, password: string): Promise<Account> {
    const account = await this.store.findAccountByCredentials(
      username,
      password,
    );
    if (!account) {
      this.logger.warn(`Failed login for username '${username}'`);
      throw new AuthenticationFailedException();
    }
    return account;
  }

  /**
   * Checks the transaction PIN of an account. Callers run this before any
   * money-moving request on behalf of the account holder.
   */
  async authorize(accountNumber: AccountNumber, pin: string): Promise<void> {
    const account = await this.getAccount(accountNumber);
    if (account.transactionPin !== pin) {
      this.logger.warn(`Wrong PIN for account ${accountNumber}`);
      throw new AuthenticationFailedException('Wrong transaction PIN');
    }
  }

  async openAccount(command: OpenAccountCommand): Promise<Account> {
    const name = command.name.trim();
    if (!name) {
      throw new InvalidInputException('Name is required');
    }
    if (!command.username) {
      throw new InvalidInputException('Username is required');
    }
    if (!command.password) {
      throw new InvalidInputException('Password is required');
    }
    if (!PIN_PATTERN.test(command.pin)) {
      throw new InvalidInputException('PIN must be exactly four digits');
    }
    const initialBalance = toMoney(command.initialBalance);
    if (!initialBalance || initialBalance.lessThan(0)) {
      throw new InvalidInputException(
        `Initial balance must be a non-negative amount up to ${formatMoney(MAX_MONEY)} with at most two decimals`,
      );
    }
    if (await this.store.usernameExists(command.username)) {
      throw new DuplicateUsernameException(command.username);
    }

    const account = await this.withCollisionRetry(async () => {
      const accountNumber = await this.allocator.allocateAccountNumber();
      return this.store.withAccountLock([accountNumber], async (tx) => {
        const transactionId = await this.allocator.allocateTransactionId(tx);
        const openedAt = this.clock.now();

        const draft = new Account();
        draft.accountNumber = accountNumber;
        draft.name = name;
        draft.username = command.username;
        draft.password = command.password;
        draft.transactionPin = command.pin;
        draft.balance = initialBalance;
        draft.openedAt = openedAt;

        const opened = await tx.saveAccount(draft);
        await tx.appendHistory(
          historyEntry(
            transactionId,
            accountNumber,
            HistoryEntryType.ACCOUNT_OPENED,
            initialBalance,
            openedAt,
          ),
        );
        return opened;
      });
    });

    this.logger.log(
      `Opened account ${account.accountNumber} with balance ${formatMoney(account.balance)}`,
    );
    return account;
  }

  async deposit(
    accountNumber: AccountNumber,
    amount: MoneyInput,
  ): Promise<Account> {
    assertAccountNumber(accountNumber);
    const value = positiveAmount(amount);

    const account = await this.withCollisionRetry(() =>
      this.store.withAccountLock([accountNumber], async (tx) => {
        const current = await requireAccount(tx, accountNumber);
        const balance = credit(current, value);
        const transactionId = await this.allocator.allocateTransactionId(tx);
        const timestamp = this.clock.now();

        current.balance = balance;
        const updated = await tx.saveAccount(current);
        await tx.appendHistory(
          historyEntry(
            transactionId,
            accountNumber,
            HistoryEntryType.DEPOSIT,
            value,
            timestamp,
          ),
        );
        return updated;
      }),
    );

    this.logger.log(
      `Deposited ${formatMoney(value)} into ${accountNumber}; balance ${formatMoney(account.balance)}`,
    );
    return account;
  }

  async withdraw(
    accountNumber: AccountNumber,
    amount: MoneyInput,
  ): Promise<Account> {
    assertAccountNumber(accountNumber);
    const value = positiveAmount(amount);

    const account = await this.withCollisionRetry(() =>
      this.store.withAccountLock([accountNumber], async (tx) => {
        const current = await requireAccount(tx, accountNumber);
        if (current.balance.lessThan(value)) {
          throw new InsufficientFundsException(
            accountNumber,
            current.balance,
            value,
          );
        }
        const transactionId = await this.allocator.allocateTransactionId(tx);
        const timestamp = this.clock.now();

        current.balance = current.balance.minus(value);
        const updated = await tx.saveAccount(current);
        await tx.appendHistory(
          historyEntry(
            transactionId,
            accountNumber,
            HistoryEntryType.WITHDRAWAL,
            value,
            timestamp,
          ),
        );
        return updated;
      }),
    );

    this.logger.log(
      `Withdrew ${formatMoney(value)} from ${accountNumber}; balance ${formatMoney(account.balance)}`,
    );
    return account;
  }

  /**
   * Moves `amount` from sender to receiver. Both accounts are locked in
   * ascending order for the whole scope, whichever side initiated, and the
   * two balance writes and two history entries commit as one unit.
   */
  async transfer(
    senderAccountNumber: AccountNumber,
    receiverAccountNumber: AccountNumber,
    amount: MoneyInput,
  ): Promise<TransferResult> {
    assertAccountNumber(senderAccountNumber);
    assertAccountNumber(receiverAccountNumber);
    const value = positiveAmount(amount);
    if (senderAccountNumber === receiverAccountNumber) {
      throw new InvalidInputException(
        'Sender and receiver accounts must differ',
      );
    }

    const result = await this.withCollisionRetry(() =>
      this.store.withAccountLock(
        [senderAccountNumber, receiverAccountNumber],
        async (tx) => {
          const receiver = await requireAccount(tx, receiverAccountNumber);
          const sender = await requireAccount(tx, senderAccountNumber);
          if (sender.balance.lessThan(value)) {
            throw new InsufficientFundsException(
              senderAccountNumber,
              sender.balance,
              value,
            );
          }
          const receiverBalance = credit(receiver, value);
          const [sentId, receivedId] =
            await this.allocator.allocateTransactionIds(2, tx);
          const timestamp = this.clock.now();

          sender.balance = sender.balance.minus(value);
          receiver.balance = receiverBalance;

          const updatedSender = await tx.saveAccount(sender);
          const updatedReceiver = await tx.saveAccount(receiver);
          await tx.appendHistory(
            historyEntry(
              sentId,
              senderAccountNumber,
              HistoryEntryType.TRANSFER_SENT,
              value,
              timestamp,
            ),
          );
          await tx.appendHistory(
            historyEntry(
              receivedId,
              receiverAccountNumber,
              HistoryEntryType.TRANSFER_RECEIVED,
              value,
              timestamp,
            ),
          );
          return { sender: updatedSender, receiver: updatedReceiver };
        },
      ),
    );

    this.logger.log(
      `Transferred ${formatMoney(value)} from ${senderAccountNumber} to ${receiverAccountNumber}`,
    );
    return result;
  }

  async getAccount(accountNumber: AccountNumber): Promise<Account> {
    assertAccountNumber(accountNumber);
    const account = await this.store.findAccountByNumber(accountNumber);
    if (!account) {
      throw new AccountNotFoundException(accountNumber);
    }
    return account;
  }

  async getBalance(accountNumber: AccountNumber): Promise<Decimal> {
    const account = await this.getAccount(accountNumber);
    return account.balance;
  }

  /**
   * Every entry of the account, newest first.
   */
  async getHistory(accountNumber: AccountNumber): Promise<HistoryEntry[]> {
    assertAccountNumber(accountNumber);
    if (!(await this.store.accountNumberExists(accountNumber))) {
      throw new AccountNotFoundException(accountNumber);
    }
    return this.store.historyForAccount(accountNumber);
  }

  private withCollisionRetry<T>(operation: () => Promise<T>): Promise<T> {
    return this.retryStrategy.executeWithRetry(
      operation,
      this.collisionPolicy,
      {
        onRetry: (attempt, delay, error) => {
          this.logger.warn(
            `Retry attempt ${attempt} after ${Math.round(delay)}ms: ${error.message}`,
          );
        },
        onMaxRetriesExceeded: (maxRetries) => {
          this.logger.error(
            `Identifier collisions persisted across ${maxRetries} attempts`,
          );
        },
      },
      { maxRetries: this.config.allocationAttempts },
    );
  }
}

function assertAccountNumber(value: AccountNumber): void {
  if (!isAccountNumber(value)) {
    throw new InvalidInputException(`Invalid account number '${value}'`);
  }
}

function positiveAmount(amount: MoneyInput): Decimal {
  const value = toMoney(amount);
  if (!value || value.lessThanOrEqualTo(0)) {
    throw new InvalidInputException(
      `Amount must be greater than zero, up to ${formatMoney(MAX_MONEY)}, with at most two decimals`,
    );
  }
  return value;
}

/** Balance after crediting `amount`, refused past the money column limit */
function credit(account: Account, amount: Decimal): Decimal {
  const balance = account.balance.plus(amount);
  if (exceedsMoneyLimit(balance)) {
    throw new InvalidInputException(
      `Crediting ${formatMoney(amount)} would take account ${account.accountNumber} past ${formatMoney(MAX_MONEY)}`,
    );
  }
  return balance;
}

async function requireAccount(
  tx: LedgerTransaction,
  accountNumber: AccountNumber,
): Promise<Account> {
  const account = await tx.findAccountByNumber(accountNumber);
  if (!account) {
    throw new AccountNotFoundException(accountNumber);
  }
  return account;
}

function historyEntry(
  transactionId: TransactionId,
  accountNumber: AccountNumber,
  type: HistoryEntryType,
  amount: Decimal,
  timestamp: Date,
): HistoryEntry {
  const entry = new HistoryEntry();
  entry.transactionId = transactionId;
  entry.accountNumber = accountNumber;
  entry.type = type;
  entry.amount = amount;
  entry.timestamp = timestamp;
  return entry;
}
