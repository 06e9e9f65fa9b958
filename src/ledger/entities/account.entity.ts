import {
  Entity,
  Column,
  PrimaryColumn,
  VersionColumn,
  OneToMany,
  Check,
  Unique,
} from 'typeorm';
import { Decimal } from 'decimal.js';
import { HistoryEntry } from './history-entry.entity';
import {
  MONEY_PRECISION,
  MONEY_SCALE,
  bigintTransformer,
  moneyTransformer,
} from '../money';

export const ACCOUNT_PK = 'PK_accounts_account_number';
export const ACCOUNT_USERNAME_UNIQUE = 'UQ_accounts_username';

@Entity('accounts')
@Check('CHK_accounts_balance_non_negative', '"balance" >= 0')
@Unique(ACCOUNT_USERNAME_UNIQUE, ['username'])
export class Account {
  /**
   * Bank code followed by an 8-digit suffix
   * @example 870512345678
   */
  @PrimaryColumn('bigint', {
    name: 'account_number',
    primaryKeyConstraintName: ACCOUNT_PK,
    transformer: bigintTransformer,
  })
  accountNumber!: number;

  /** The account holder's name */
  @Column({ name: 'holder_name', length: 100 })
  name!: string;

  @Column({ length: 50 })
  username!: string;

  /** Compared verbatim on login */
  @Column()
  password!: string;

  /** Four-digit PIN required before moving money */
  @Column({ name: 'transaction_pin', length: 4 })
  transactionPin!: string;

  @Column('decimal', {
    precision: MONEY_PRECISION,
    scale: MONEY_SCALE,
    default: 0,
    transformer: moneyTransformer,
  })
  balance!: Decimal;

  /** Incremented on every committed mutation */
  @VersionColumn()
  version!: number;

  @Column({ name: 'opened_at', type: 'timestamptz' })
  openedAt!: Date;

  /** Append-only; never cascaded, never removed */
  @OneToMany(() => HistoryEntry, (entry) => entry.account)
  historyEntries?: HistoryEntry[];
}
