import { ApiProperty } from '@nestjs/swagger';
import { IsISO8601, Matches } from 'class-validator';

export class DateQueryDto {
  @ApiProperty({ example: '2024-01-10', description: 'Calendar date (UTC) in YYYY-MM-DD format' })
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'Invalid date format. Use YYYY-MM-DD' })
  @IsISO8601({ strict: true }, { message: 'Invalid date format. Use YYYY-MM-DD' })
  date!: string;
}
