import { ApiProperty } from '@nestjs/swagger';
import {
  HistoryEntry,
  HistoryEntryType,
} from '../entities/history-entry.entity';
import { formatMoney } from '../money';

export class HistoryEntryResponseDto {
  @ApiProperty({ example: 1804289383 })
  transactionId!: number;

  @ApiProperty({ example: 870512345678 })
  accountNumber!: number;

  @ApiProperty({ enum: HistoryEntryType, example: HistoryEntryType.DEPOSIT })
  type!: HistoryEntryType;

  @ApiProperty({ example: '500.00' })
  amount!: string;

  @ApiProperty({ example: '2026-01-01T09:00:00.000Z' })
  timestamp!: string;

  static from(entry: HistoryEntry): HistoryEntryResponseDto {
    const dto = new HistoryEntryResponseDto();
    dto.transactionId = entry.transactionId;
    dto.accountNumber = entry.accountNumber;
    dto.type = entry.type;
    dto.amount = formatMoney(entry.amount);
    dto.timestamp = entry.timestamp.toISOString();
    return dto;
  }
}
