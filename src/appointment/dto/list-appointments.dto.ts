import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsOptional, IsString } from 'class-validator';
import { DateQueryDto } from '../../common/dto/date-query.dto';
import { trimToUndefined } from '../../common/dto/transforms';

export class ListAppointmentsDto extends DateQueryDto {
  @ApiPropertyOptional({ example: 'doe', description: 'Case-insensitive part of the patient name' })
  @IsOptional()
  @Transform(trimToUndefined)
  @IsString()
  patientName?: string;
}
