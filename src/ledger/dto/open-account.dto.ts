import { ApiProperty } from '@nestjs/swagger';
import {
  IsNotEmpty,
  IsNumber,
  IsString,
  Matches,
  MaxLength,
  Min,
} from 'class-validator';

export class OpenAccountDto {
  @ApiProperty({ example: 'Ada Lovelace' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @ApiProperty({ example: 1000.0 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  initialBalance!: number;

  @ApiProperty({ example: 'ada' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  username!: string;

  @ApiProperty({ example: 'test-password' })
  @IsString()
  @IsNotEmpty()
  password!: string;

  @ApiProperty({ example: '1234', description: 'Four-digit transaction PIN' })
  @Matches(/^\d{4}$/)
  pin!: string;
}
