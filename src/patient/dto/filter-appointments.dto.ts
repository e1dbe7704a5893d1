import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsIn, IsOptional, IsString } from 'class-validator';
import { trimToUndefined } from '../../common/dto/transforms';

export type AppointmentCondition = 'future' | 'past';

export class FilterAppointmentsDto {
  @ApiPropertyOptional({ enum: ['future', 'past'], description: 'future = scheduled, past = completed' })
  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' && value.trim() ? value.trim().toLowerCase() : undefined))
  @IsIn(['future', 'past'], { message: 'condition must be future or past' })
  condition?: AppointmentCondition;

  @ApiPropertyOptional({ example: 'smith', description: 'Case-insensitive part of the doctor name' })
  @IsOptional()
  @Transform(trimToUndefined)
  @IsString()
  doctorName?: string;
}
