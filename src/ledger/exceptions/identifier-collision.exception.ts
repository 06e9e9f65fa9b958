import { HttpStatus } from '@nestjs/common';
import { LedgerException } from './ledger.exception';

export type IdentifierKind = 'account number' | 'transaction id';

/**
 * A freshly drawn identifier turned out to be taken when the write landed.
 * The service redraws and reruns the operation; callers only see this when
 * no retry policy is in place.
 *
 * HTTP Status: 409 CONFLICT
 */
export class IdentifierCollisionException extends LedgerException {
  constructor(
    readonly identifier: IdentifierKind,
    value: number,
    cause?: unknown,
  ) {
    super(
      'IdentifierCollision',
      `${identifier} ${value} is already in use`,
      HttpStatus.CONFLICT,
      true,
      cause,
    );
  }
}
