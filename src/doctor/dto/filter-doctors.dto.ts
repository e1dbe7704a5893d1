import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsIn, IsOptional, IsString } from 'class-validator';
import { trimToUndefined } from '../../common/dto/transforms';
import { TimePeriod } from '../../common/scheduling';

export class FilterDoctorsDto {
  @ApiPropertyOptional({ example: 'smith', description: 'Case-insensitive part of the doctor name' })
  @IsOptional()
  @Transform(trimToUndefined)
  @IsString()
  name?: string;

  @ApiPropertyOptional({ example: 'cardiology', description: 'Specialty, matched case-insensitively' })
  @IsOptional()
  @Transform(trimToUndefined)
  @IsString()
  specialty?: string;

  @ApiPropertyOptional({ enum: ['AM', 'PM'], description: 'Half of the day with at least one available slot' })
  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' && value.trim() ? value.trim().toUpperCase() : undefined))
  @IsIn(['AM', 'PM'], { message: 'time must be AM or PM' })
  time?: TimePeriod;
}
