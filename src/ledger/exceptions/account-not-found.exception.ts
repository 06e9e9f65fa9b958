// src/ledger/exceptions/account-not-found.exception.ts
import { HttpStatus } from '@nestjs/common';
import { LedgerException } from './ledger.exception';

/**
 * Thrown when an operation references an account number that does not exist.
 *
 * HTTP Status: 404 NOT FOUND
 *
 * Not retryable: the caller must correct the account number.
 */
export class AccountNotFoundException extends LedgerException {
  constructor(accountNumber: number) {
    super(
      'AccountNotFound',
      `Account '${accountNumber}' not found`,
      HttpStatus.NOT_FOUND,
    );
  }
}
