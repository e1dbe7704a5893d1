import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { Appointment } from '../entities/appointment.entity';
import { Doctor } from '../entities/doctor.entity';
import { AppointmentValidatorService } from './appointment-validator.service';
import { AppointmentController } from './appointment.controller';
import { AppointmentService } from './appointment.service';

@Module({
  imports: [TypeOrmModule.forFeature([Appointment, Doctor]), AuthModule],
  controllers: [AppointmentController],
  providers: [AppointmentService, AppointmentValidatorService],
  exports: [AppointmentService],
})
export class AppointmentModule {}
