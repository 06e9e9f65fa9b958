import { HttpStatus } from '@nestjs/common';
import { LedgerException } from './ledger.exception';

/**
 * Identifier allocation kept colliding past its attempt budget.
 *
 * HTTP Status: 503 SERVICE UNAVAILABLE
 */
export class ResourceExhaustedException extends LedgerException {
  constructor(message: string) {
    super('ResourceExhausted', message, HttpStatus.SERVICE_UNAVAILABLE);
  }
}
