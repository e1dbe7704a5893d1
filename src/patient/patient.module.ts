import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { Appointment } from '../entities/appointment.entity';
import { Patient } from '../entities/patient.entity';
import { PatientController } from './patient.controller';
import { PatientService } from './patient.service';

@Module({
  imports: [TypeOrmModule.forFeature([Patient, Appointment]), AuthModule],
  controllers: [PatientController],
  providers: [PatientService],
})
export class PatientModule {}
