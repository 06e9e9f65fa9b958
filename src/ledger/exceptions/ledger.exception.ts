import { HttpException, HttpStatus } from '@nestjs/common';

export type LedgerErrorKind =
  | 'InvalidInput'
  | 'DuplicateUsername'
  | 'AuthenticationFailed'
  | 'AccountNotFound'
  | 'InsufficientFunds'
  | 'IdentifierCollision'
  | 'ResourceExhausted'
  | 'Busy'
  | 'StorageFailure';

/**
 * Base of every failure the ledger reports. The `kind` discriminates the
 * failure for callers; the HTTP status is what Nest renders for it.
 */
export abstract class LedgerException extends HttpException {
  protected constructor(
    readonly kind: LedgerErrorKind,
    message: string,
    status: HttpStatus,
    readonly retryable: boolean = false,
    cause?: unknown,
  ) {
    super(
      {
        statusCode: status,
        message,
        error: kind,
        retryable,
      },
      status,
      { cause },
    );
  }
}
