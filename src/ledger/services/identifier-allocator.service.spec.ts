import { Test, TestingModule } from '@nestjs/testing';
import ledgerConfig, { DEFAULT_LEDGER_CONFIG } from '../../config/ledger.config';
import { ResourceExhaustedException } from '../exceptions/resource-exhausted.exception';
import { LEDGER_STORE } from '../store/ledger-store.interface';
import {
  IdentifierAllocator,
  RANDOM_SOURCE,
  RandomSource,
} from './identifier-allocator.service';

describe('IdentifierAllocator', () => {
  let allocator: IdentifierAllocator;

  const draws: number[] = [];
  const random: RandomSource = {
    nextInt: jest.fn((min: number) => draws.shift() ?? min),
  };
  const mockStore = {
    accountNumberExists: jest.fn(),
    transactionIdExists: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    draws.length = 0;
    mockStore.accountNumberExists.mockResolvedValue(false);
    mockStore.transactionIdExists.mockResolvedValue(false);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        IdentifierAllocator,
        { provide: RANDOM_SOURCE, useValue: random },
        { provide: LEDGER_STORE, useValue: mockStore },
        {
          provide: ledgerConfig.KEY,
          useValue: { ...DEFAULT_LEDGER_CONFIG, allocationAttempts: 3 },
        },
      ],
    }).compile();

    allocator = module.get(IdentifierAllocator);
  });

  describe('account numbers', () => {
    it('should prefix an 8-digit suffix with the bank code', async () => {
      draws.push(12345678);

      await expect(allocator.allocateAccountNumber()).resolves.toBe(
        870512345678,
      );
      expect(random.nextInt).toHaveBeenCalledWith(10_000_000, 100_000_000);
    });

    it('should redraw while the number is taken', async () => {
      draws.push(11111111, 22222222);
      mockStore.accountNumberExists
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(false);

      await expect(allocator.allocateAccountNumber()).resolves.toBe(
        870522222222,
      );
      expect(mockStore.accountNumberExists).toHaveBeenNthCalledWith(
        1,
        870511111111,
      );
    });

    it('should give up after the configured attempts', async () => {
      mockStore.accountNumberExists.mockResolvedValue(true);

      await expect(allocator.allocateAccountNumber()).rejects.toThrow(
        ResourceExhaustedException,
      );
      expect(mockStore.accountNumberExists).toHaveBeenCalledTimes(3);
    });
  });

  describe('transaction ids', () => {
    it('should fold negative draws to their absolute value', async () => {
      draws.push(-42);

      await expect(allocator.allocateTransactionId()).resolves.toBe(42);
    });

    it('should never draw the most negative 32-bit value', () => {
      allocator.drawTransactionId();

      expect(random.nextInt).toHaveBeenCalledWith(-(2 ** 31 - 1), 2 ** 31);
    });

    it('should check a reader passed in place of the store', async () => {
      draws.push(5, 6);
      const reader = {
        findAccountByNumber: jest.fn(),
        accountNumberExists: jest.fn(),
        usernameExists: jest.fn(),
        transactionIdExists: jest
          .fn()
          .mockResolvedValueOnce(true)
          .mockResolvedValueOnce(false),
      };

      await expect(allocator.allocateTransactionId(reader)).resolves.toBe(6);
      expect(mockStore.transactionIdExists).not.toHaveBeenCalled();
    });

    it('should hand out distinct ids within one batch', async () => {
      draws.push(9, 9, 10);

      await expect(allocator.allocateTransactionIds(2)).resolves.toEqual([
        9, 10,
      ]);
      expect(mockStore.transactionIdExists).toHaveBeenCalledTimes(2);
    });
  });
});
