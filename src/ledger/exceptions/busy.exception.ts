// src/ledger/exceptions/busy.exception.ts
import { HttpStatus } from '@nestjs/common';
import { LedgerException } from './ledger.exception';

/**
 * Thrown when the account locks an operation needs could not be acquired
 * within the configured wait, or the database aborted the transaction over
 * lock contention.
 *
 * HTTP Status: 503 SERVICE UNAVAILABLE
 *
 * Transient: nothing was committed and the client MAY retry.
 */
export class BusyException extends LedgerException {
  constructor(message: string, cause?: unknown) {
    super('Busy', message, HttpStatus.SERVICE_UNAVAILABLE, true, cause);
  }
}
