import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class AdminLoginDto {
  @ApiProperty({ example: 'admin' })
  @IsString({ message: 'Username must be text' })
  @IsNotEmpty({ message: 'Username cannot be empty' })
  username!: string;

  @ApiProperty({ example: 'Test@123' })
  @IsString({ message: 'Password must be text' })
  @IsNotEmpty({ message: 'Password cannot be empty' })
  password!: string;
}
