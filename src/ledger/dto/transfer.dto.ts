import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsPositive } from 'class-validator';
import { MoneyMovementDto } from './money-movement.dto';

export class TransferDto extends MoneyMovementDto {
  @ApiProperty({ example: 870587654321, description: 'Receiver account number' })
  @IsInt()
  @IsPositive()
  to!: number;
}
