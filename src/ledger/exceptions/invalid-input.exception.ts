import { HttpStatus } from '@nestjs/common';
import { LedgerException } from './ledger.exception';

/**
 * Malformed or out-of-range argument: negative opening balance,
 * non-positive amount, malformed PIN.
 *
 * HTTP Status: 400 BAD REQUEST
 */
export class InvalidInputException extends LedgerException {
  constructor(message: string) {
    super('InvalidInput', message, HttpStatus.BAD_REQUEST);
  }
}
