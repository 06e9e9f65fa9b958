import { HttpStatus } from '@nestjs/common';
import { LedgerException } from './ledger.exception';

/**
 * Credential or PIN mismatch.
 *
 * HTTP Status: 401 UNAUTHORIZED
 */
export class AuthenticationFailedException extends LedgerException {
  constructor(message = 'Invalid credentials') {
    super('AuthenticationFailed', message, HttpStatus.UNAUTHORIZED);
  }
}
