import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional } from 'class-validator';
import { AppointmentStatus } from '../../entities/appointment.entity';
import { CreateAppointmentDto } from './create-appointment.dto';

const STATUSES = [AppointmentStatus.SCHEDULED, AppointmentStatus.COMPLETED, AppointmentStatus.CANCELLED];

export class UpdateAppointmentDto extends CreateAppointmentDto {
  @ApiPropertyOptional({ enum: STATUSES, description: '0 scheduled, 1 completed, 2 cancelled' })
  @IsOptional()
  @IsIn(STATUSES, { message: 'status must be 0, 1 or 2' })
  status?: AppointmentStatus;
}
