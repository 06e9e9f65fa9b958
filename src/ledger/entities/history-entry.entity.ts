import {
  Entity,
  Column,
  PrimaryColumn,
  ManyToOne,
  JoinColumn,
  Index,
  Check,
  Relation,
} from 'typeorm';
import { Decimal } from 'decimal.js';
import { Account } from './account.entity';
import {
  MONEY_PRECISION,
  MONEY_SCALE,
  bigintTransformer,
  moneyTransformer,
} from '../money';

export const HISTORY_ENTRY_PK = 'PK_history_entries_transaction_id';

/**
 * The kind of ledger event an entry records.
 */
export enum HistoryEntryType {
  /** Opening balance of a new account */
  ACCOUNT_OPENED = 'AccountOpened',
  DEPOSIT = 'Deposit',
  WITHDRAWAL = 'Withdrawal',
  /** Debit side of a transfer */
  TRANSFER_SENT = 'TransferSent',
  /** Credit side of a transfer */
  TRANSFER_RECEIVED = 'TransferReceived',
}

/**
 * Immutable record of one balance-affecting event. Created once by the
 * operation that causes it and never updated or deleted.
 */
@Entity('history_entries')
@Index(['accountNumber', 'timestamp'])
@Check('CHK_history_entries_amount_non_negative', '"amount" >= 0')
export class HistoryEntry {
  @PrimaryColumn('int', {
    name: 'transaction_id',
    primaryKeyConstraintName: HISTORY_ENTRY_PK,
  })
  transactionId!: number;

  @Column('bigint', { name: 'account_number', transformer: bigintTransformer })
  accountNumber!: number;

  @Column({
    type: 'enum',
    enum: HistoryEntryType,
  })
  type!: HistoryEntryType;

  @Column('decimal', {
    precision: MONEY_PRECISION,
    scale: MONEY_SCALE,
    transformer: moneyTransformer,
  })
  amount!: Decimal;

  /** Default ordering key for history, newest first */
  @Column({ type: 'timestamptz' })
  timestamp!: Date;

  @ManyToOne(() => Account, (account) => account.historyEntries, {
    onDelete: 'RESTRICT',
  })
  @JoinColumn({ name: 'account_number' })
  account?: Relation<Account>;
}
