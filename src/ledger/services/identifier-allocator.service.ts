import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomInt } from 'node:crypto';
import ledgerConfig, { LedgerConfig } from '../../config/ledger.config';
import { ResourceExhaustedException } from '../exceptions/resource-exhausted.exception';
import { AccountNumber, TransactionId } from '../ledger.types';
import {
  LEDGER_STORE,
  LedgerReader,
  LedgerStore,
} from '../store/ledger-store.interface';

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

export interface RandomSource {
  /** Uniform integer in [min, max) */
  nextInt(min: number, max: number): number;
}

export const cryptoRandomSource: RandomSource = {
  nextInt: (min, max) => randomInt(min, max),
};

export const ACCOUNT_SUFFIX_MIN = 10_000_000;
export const ACCOUNT_SUFFIX_MAX = 100_000_000;
const INT32_MAX = 2 ** 31 - 1;

/**
 * Draws account numbers and transaction ids at random and verifies each
 * against the store before handing it out. A draw that is taken is
 * discarded and redrawn, up to the configured number of attempts.
 */
@Injectable()
export class IdentifierAllocator {
  private readonly logger = new Logger(IdentifierAllocator.name);

  constructor(
    @Inject(RANDOM_SOURCE)
    private readonly random: RandomSource,
    @Inject(LEDGER_STORE)
    private readonly store: LedgerStore,
    @Inject(ledgerConfig.KEY)
    private readonly config: LedgerConfig,
  ) {}

  /** Bank code followed by 8 digits, e.g. 870512345678 */
  drawAccountNumber(): AccountNumber {
    const suffix = this.random.nextInt(ACCOUNT_SUFFIX_MIN, ACCOUNT_SUFFIX_MAX);
    return Number(`${this.config.bankCode}${suffix}`);
  }

  /**
   * |x| for x drawn from the 32-bit signed range. The most negative value
   * has no positive counterpart, so the draw starts one above it.
   */
  drawTransactionId(): TransactionId {
    return Math.abs(this.random.nextInt(-INT32_MAX, INT32_MAX + 1));
  }

  allocateAccountNumber(
    reader: LedgerReader = this.store,
  ): Promise<AccountNumber> {
    return this.allocate(
      'account number',
      () => this.drawAccountNumber(),
      (candidate) => reader.accountNumberExists(candidate),
    );
  }

  allocateTransactionId(
    reader: LedgerReader = this.store,
  ): Promise<TransactionId> {
    return this.allocate(
      'transaction id',
      () => this.drawTransactionId(),
      (candidate) => reader.transactionIdExists(candidate),
    );
  }

  /** `count` distinct transaction ids, none of them in use */
  async allocateTransactionIds(
    count: number,
    reader: LedgerReader = this.store,
  ): Promise<TransactionId[]> {
    const ids: TransactionId[] = [];
    while (ids.length < count) {
      ids.push(
        await this.allocate(
          'transaction id',
          () => this.drawTransactionId(),
          async (candidate) =>
            ids.includes(candidate) ||
            (await reader.transactionIdExists(candidate)),
        ),
      );
    }
    return ids;
  }

  private async allocate(
    label: string,
    draw: () => number,
    isTaken: (candidate: number) => Promise<boolean>,
  ): Promise<number> {
    for (let attempt = 1; attempt <= this.config.allocationAttempts; attempt++) {
      const candidate = draw();
      if (!(await isTaken(candidate))) {
        return candidate;
      }
      this.logger.warn(
        `Drew ${label} ${candidate} already in use (attempt ${attempt}/${this.config.allocationAttempts})`,
      );
    }
    this.logger.error(
      `Gave up allocating a ${label} after ${this.config.allocationAttempts} attempts`,
    );
    throw new ResourceExhaustedException(
      `Could not allocate a free ${label} after ${this.config.allocationAttempts} attempts`,
    );
  }
}
