import { Test, TestingModule } from '@nestjs/testing';
import { Decimal } from 'decimal.js';
import ledgerConfig, { DEFAULT_LEDGER_CONFIG } from '../config/ledger.config';
import { Account } from './entities/account.entity';
import { HistoryEntryType } from './entities/history-entry.entity';
import { AccountNotFoundException } from './exceptions/account-not-found.exception';
import { AuthenticationFailedException } from './exceptions/authentication-failed.exception';
import { DuplicateUsernameException } from './exceptions/duplicate-username.exception';
import { InsufficientFundsException } from './exceptions/insufficient-funds.exception';
import { InvalidInputException } from './exceptions/invalid-input.exception';
import { LedgerService } from './ledger.service';
import { IdentifierAllocator } from './services/identifier-allocator.service';
import { LedgerClock } from './services/ledger-clock.service';
import { RetryStrategy } from './services/retry-strategy.service';
import { LEDGER_STORE } from './store/ledger-store.interface';

function storedAccount(accountNumber: number, balance: string): Account {
  const account = new Account();
  account.accountNumber = accountNumber;
  account.name = 'Holder';
  account.username = `user-${accountNumber}`;
  account.password = 'test-password';
  account.transactionPin = '1234';
  account.balance = new Decimal(balance);
  account.version = 1;
  account.openedAt = new Date(0);
  return account;
}

describe('LedgerService', () => {
  let service: LedgerService;

  const mockTx = {
    findAccountByNumber: jest.fn(),
    accountNumberExists: jest.fn(),
    usernameExists: jest.fn(),
    transactionIdExists: jest.fn(),
    saveAccount: jest.fn(),
    appendHistory: jest.fn(),
  };

  const mockStore = {
    withAccountLock: jest.fn(),
    findAccountByCredentials: jest.fn(),
    findAccountByNumber: jest.fn(),
    accountNumberExists: jest.fn(),
    usernameExists: jest.fn(),
    transactionIdExists: jest.fn(),
    historyForAccount: jest.fn(),
  };

  const mockAllocator = {
    allocateAccountNumber: jest.fn(),
    allocateTransactionId: jest.fn(),
    allocateTransactionIds: jest.fn(),
  };

  const mockRetryStrategy = {
    executeWithRetry: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockStore.withAccountLock.mockImplementation(
      (_accounts: unknown, fn: (tx: typeof mockTx) => Promise<unknown>) =>
        fn(mockTx),
    );
    mockRetryStrategy.executeWithRetry.mockImplementation(
      (operation: () => Promise<unknown>) => operation(),
    );
    mockTx.saveAccount.mockImplementation(async (account: Account) => account);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LedgerService,
        LedgerClock,
        { provide: LEDGER_STORE, useValue: mockStore },
        { provide: IdentifierAllocator, useValue: mockAllocator },
        { provide: RetryStrategy, useValue: mockRetryStrategy },
        { provide: ledgerConfig.KEY, useValue: DEFAULT_LEDGER_CONFIG },
      ],
    }).compile();

    service = module.get<LedgerService>(LedgerService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('openAccount', () => {
    const command = {
      name: '  Ada  ',
      initialBalance: '1500',
      username: 'ada',
      password: 'test-password',
      pin: '1234',
    };

    it('should reject a taken username before allocating anything', async () => {
      mockStore.usernameExists.mockResolvedValue(true);

      await expect(service.openAccount(command)).rejects.toThrow(
        DuplicateUsernameException,
      );
      expect(mockAllocator.allocateAccountNumber).not.toHaveBeenCalled();
    });

    it('should save the account and its opening entry in one scope', async () => {
      mockStore.usernameExists.mockResolvedValue(false);
      mockAllocator.allocateAccountNumber.mockResolvedValue(870512345678);
      mockAllocator.allocateTransactionId.mockResolvedValue(99);

      const account = await service.openAccount(command);

      expect(mockStore.withAccountLock).toHaveBeenCalledWith(
        [870512345678],
        expect.any(Function),
      );
      expect(mockAllocator.allocateTransactionId).toHaveBeenCalledWith(mockTx);
      expect(account.name).toBe('Ada');
      expect(account.balance.toFixed(2)).toBe('1500.00');
      expect(mockTx.appendHistory).toHaveBeenCalledWith(
        expect.objectContaining({
          transactionId: 99,
          accountNumber: 870512345678,
          type: HistoryEntryType.ACCOUNT_OPENED,
          timestamp: account.openedAt,
        }),
      );
    });

    it('should run inside the collision retry with the configured attempts', async () => {
      mockStore.usernameExists.mockResolvedValue(false);
      mockAllocator.allocateAccountNumber.mockResolvedValue(870512345678);
      mockAllocator.allocateTransactionId.mockResolvedValue(99);

      await service.openAccount(command);

      expect(mockRetryStrategy.executeWithRetry).toHaveBeenCalledWith(
        expect.any(Function),
        expect.objectContaining({ isRetryable: expect.any(Function) }),
        expect.any(Object),
        { maxRetries: 10 },
      );
    });

    it.each([
      [{ ...command, name: '   ' }],
      [{ ...command, pin: '12a4' }],
      [{ ...command, initialBalance: '-1' }],
      [{ ...command, initialBalance: '1.001' }],
    ])('should reject %o before touching the store', async (invalid) => {
      await expect(service.openAccount(invalid)).rejects.toThrow(
        InvalidInputException,
      );
      expect(mockStore.usernameExists).not.toHaveBeenCalled();
    });
  });

  describe('deposit', () => {
    it('should add the amount and record a deposit entry', async () => {
      mockTx.findAccountByNumber.mockResolvedValue(
        storedAccount(870511111111, '100'),
      );
      mockAllocator.allocateTransactionId.mockResolvedValue(55);

      const account = await service.deposit(870511111111, '50.25');

      expect(account.balance.toFixed(2)).toBe('150.25');
      expect(mockTx.appendHistory).toHaveBeenCalledWith(
        expect.objectContaining({
          transactionId: 55,
          type: HistoryEntryType.DEPOSIT,
          amount: new Decimal('50.25'),
        }),
      );
    });

    it('should fail with AccountNotFound inside the scope', async () => {
      mockTx.findAccountByNumber.mockResolvedValue(null);

      await expect(service.deposit(870511111111, 10)).rejects.toThrow(
        AccountNotFoundException,
      );
      expect(mockTx.saveAccount).not.toHaveBeenCalled();
    });
  });

  describe('withdraw', () => {
    it.each([0, -5, '0.001', 'abc'])(
      'should reject amount %p without opening a scope',
      async (amount) => {
        await expect(service.withdraw(870511111111, amount)).rejects.toThrow(
          InvalidInputException,
        );
        expect(mockStore.withAccountLock).not.toHaveBeenCalled();
      },
    );

    it('should refuse to overdraw and write nothing', async () => {
      mockTx.findAccountByNumber.mockResolvedValue(
        storedAccount(870511111111, '40'),
      );

      await expect(service.withdraw(870511111111, '40.01')).rejects.toThrow(
        InsufficientFundsException,
      );
      expect(mockTx.saveAccount).not.toHaveBeenCalled();
      expect(mockAllocator.allocateTransactionId).not.toHaveBeenCalled();
    });
  });

  describe('transfer', () => {
    it('should lock both accounts and record both sides with one timestamp', async () => {
      mockTx.findAccountByNumber.mockImplementation(async (n: number) =>
        storedAccount(n, n === 870522222222 ? '300' : '50'),
      );
      mockAllocator.allocateTransactionIds.mockResolvedValue([7, 8]);

      const { sender, receiver } = await service.transfer(
        870522222222,
        870511111111,
        '120',
      );

      expect(mockStore.withAccountLock).toHaveBeenCalledWith(
        [870522222222, 870511111111],
        expect.any(Function),
      );
      expect(sender.balance.toFixed(2)).toBe('180.00');
      expect(receiver.balance.toFixed(2)).toBe('170.00');

      const [sent, received] = mockTx.appendHistory.mock.calls.map(
        ([entry]) => entry,
      );
      expect(sent).toMatchObject({
        transactionId: 7,
        accountNumber: 870522222222,
        type: HistoryEntryType.TRANSFER_SENT,
      });
      expect(received).toMatchObject({
        transactionId: 8,
        accountNumber: 870511111111,
        type: HistoryEntryType.TRANSFER_RECEIVED,
      });
      expect(received.timestamp).toBe(sent.timestamp);
    });

    it('should reject a transfer to the same account', async () => {
      await expect(
        service.transfer(870511111111, 870511111111, 10),
      ).rejects.toThrow(InvalidInputException);
      expect(mockStore.withAccountLock).not.toHaveBeenCalled();
    });
  });

  describe('authorize', () => {
    it('should accept the matching PIN', async () => {
      mockStore.findAccountByNumber.mockResolvedValue(
        storedAccount(870511111111, '0'),
      );

      await expect(
        service.authorize(870511111111, '1234'),
      ).resolves.toBeUndefined();
    });

    it('should reject a wrong PIN', async () => {
      mockStore.findAccountByNumber.mockResolvedValue(
        storedAccount(870511111111, '0'),
      );

      await expect(service.authorize(870511111111, '4321')).rejects.toThrow(
        AuthenticationFailedException,
      );
    });
  });

  describe('getHistory', () => {
    it('should fail for an unknown account without reading history', async () => {
      mockStore.accountNumberExists.mockResolvedValue(false);

      await expect(service.getHistory(870511111111)).rejects.toThrow(
        AccountNotFoundException,
      );
      expect(mockStore.historyForAccount).not.toHaveBeenCalled();
    });
  });
});
