// src/config/ledger.config.ts
import { registerAs } from '@nestjs/config';

export type LedgerStoreDriver = 'postgres' | 'memory';

export interface LedgerConfig {
  /** Which LedgerStore implementation backs the service */
  store: LedgerStoreDriver;
  /** Four-digit prefix of every account number */
  bankCode: string;
  /** Bounded wait for account locks before failing with Busy */
  lockTimeoutMs: number;
  /** Draws allowed per identifier before failing with ResourceExhausted */
  allocationAttempts: number;
}

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  store: 'postgres',
  bankCode: '8705',
  lockTimeoutMs: 5000,
  allocationAttempts: 10,
};

export function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got '${raw}'`);
  }
  return parsed;
}

export function loadLedgerConfig(
  env: NodeJS.ProcessEnv = process.env,
): LedgerConfig {
  const bankCode = env.LEDGER_BANK_CODE || DEFAULT_LEDGER_CONFIG.bankCode;
  if (!/^[1-9]\d{3}$/.test(bankCode)) {
    throw new Error(`LEDGER_BANK_CODE must be four digits, got '${bankCode}'`);
  }

  return {
    store: env.LEDGER_STORE === 'memory' ? 'memory' : 'postgres',
    bankCode,
    lockTimeoutMs: positiveInt(
      env.LEDGER_LOCK_TIMEOUT_MS,
      DEFAULT_LEDGER_CONFIG.lockTimeoutMs,
    ),
    allocationAttempts: positiveInt(
      env.LEDGER_ALLOCATION_ATTEMPTS,
      DEFAULT_LEDGER_CONFIG.allocationAttempts,
    ),
  };
}

export default registerAs('ledger', (): LedgerConfig => loadLedgerConfig());
