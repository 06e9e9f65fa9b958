import { ApiProperty } from '@nestjs/swagger';
import { IsNumber, IsPositive, Matches } from 'class-validator';

export class MoneyMovementDto {
  @ApiProperty({ example: 500.0 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  amount!: number;

  @ApiProperty({ example: '1234' })
  @Matches(/^\d{4}$/)
  pin!: string;
}
