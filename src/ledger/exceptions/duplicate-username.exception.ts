import { HttpStatus } from '@nestjs/common';
import { LedgerException } from './ledger.exception';

export class DuplicateUsernameException extends LedgerException {
  constructor(username: string) {
    super(
      'DuplicateUsername',
      `Username '${username}' is already registered`,
      HttpStatus.CONFLICT,
    );
  }
}
