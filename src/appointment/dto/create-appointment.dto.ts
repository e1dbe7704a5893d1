import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsISO8601, Min } from 'class-validator';

export class CreateAppointmentDto {
  @ApiProperty({ example: 1 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  doctorId!: number;

  @ApiProperty({ example: '2024-01-10T09:00:00Z', description: 'Start instant, ISO 8601' })
  @IsISO8601({ strict: true }, { message: 'appointmentTime must be an ISO 8601 date-time' })
  appointmentTime!: string;
}
