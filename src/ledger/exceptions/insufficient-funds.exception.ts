// src/ledger/exceptions/insufficient-funds.exception.ts
import { HttpStatus } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import { LedgerException } from './ledger.exception';
import { formatMoney } from '../money';

/**
 * Thrown when a withdrawal or transfer would leave a negative balance.
 *
 * HTTP Status: 422 UNPROCESSABLE ENTITY
 *
 * Not retryable: the client must lower the amount or deposit first.
 */
export class InsufficientFundsException extends LedgerException {
  readonly available: string;
  readonly requested: string;

  constructor(accountNumber: number, available: Decimal, requested: Decimal) {
    super(
      'InsufficientFunds',
      `Insufficient funds in account '${accountNumber}': available ${formatMoney(available)}, requested ${formatMoney(requested)}`,
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
    this.available = formatMoney(available);
    this.requested = formatMoney(requested);
  }
}
