import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class LoginDto {
  @ApiProperty({ example: 'ada' })
  @IsString()
  @IsNotEmpty()
  username!: string;

  @ApiProperty({ example: 'test-password' })
  @IsString()
  @IsNotEmpty()
  password!: string;
}
