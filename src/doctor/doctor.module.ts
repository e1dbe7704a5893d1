import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { Appointment } from '../entities/appointment.entity';
import { Doctor } from '../entities/doctor.entity';
import { AvailabilityService } from './availability.service';
import { DoctorFilterService } from './doctor-filter.service';
import { DoctorController } from './doctor.controller';
import { DoctorService } from './doctor.service';

@Module({
  imports: [TypeOrmModule.forFeature([Doctor, Appointment]), AuthModule],
  controllers: [DoctorController],
  providers: [DoctorService, DoctorFilterService, AvailabilityService],
  exports: [DoctorService, AvailabilityService],
})
export class DoctorModule {}
