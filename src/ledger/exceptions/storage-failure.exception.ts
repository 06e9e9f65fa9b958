import { HttpStatus } from '@nestjs/common';
import { LedgerException } from './ledger.exception';

/**
 * The persistence layer failed. The enclosing scope was rolled back and the
 * operation is not retried automatically.
 *
 * HTTP Status: 500 INTERNAL SERVER ERROR
 */
export class StorageFailureException extends LedgerException {
  constructor(message: string, cause?: unknown) {
    super(
      'StorageFailure',
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      false,
      cause,
    );
  }
}
