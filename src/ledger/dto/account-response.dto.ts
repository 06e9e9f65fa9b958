import { ApiProperty } from '@nestjs/swagger';
import { Account } from '../entities/account.entity';
import { formatMoney } from '../money';

/** Account as shown to clients; credentials and PIN are never included */
export class AccountResponseDto {
  @ApiProperty({ example: 870512345678 })
  accountNumber!: number;

  @ApiProperty({ example: 'Ada Lovelace' })
  name!: string;

  @ApiProperty({ example: 'ada' })
  username!: string;

  @ApiProperty({ example: '1500.00' })
  balance!: string;

  @ApiProperty({ example: 2 })
  version!: number;

  @ApiProperty({ example: '2026-01-01T09:00:00.000Z' })
  openedAt!: string;

  static from(account: Account): AccountResponseDto {
    const dto = new AccountResponseDto();
    dto.accountNumber = account.accountNumber;
    dto.name = account.name;
    dto.username = account.username;
    dto.balance = formatMoney(account.balance);
    dto.version = account.version;
    dto.openedAt = account.openedAt.toISOString();
    return dto;
  }
}

export class BalanceResponseDto {
  @ApiProperty({ example: 870512345678 })
  accountNumber!: number;

  @ApiProperty({ example: '1500.00' })
  balance!: string;
}

export class TransferResponseDto {
  @ApiProperty({ type: AccountResponseDto })
  sender!: AccountResponseDto;

  @ApiProperty({ type: AccountResponseDto })
  receiver!: AccountResponseDto;
}
