import { Account } from './entities/account.entity';
import { MoneyInput } from './money';

export type AccountNumber = number;
export type TransactionId = number;

export interface OpenAccountCommand {
  name: string;
  initialBalance: MoneyInput;
  username: string;
  password: string;
  /** Four-digit transaction PIN */
  pin: string;
}

export interface TransferResult {
  sender: Account;
  receiver: Account;
}

export function isAccountNumber(value: unknown): value is AccountNumber {
  return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
}

/** Ascending, de-duplicated: the one lock order every store honours */
export function lockOrder(
  accountNumbers: Iterable<AccountNumber>,
): AccountNumber[] {
  return [...new Set(accountNumbers)].sort((a, b) => a - b);
}
