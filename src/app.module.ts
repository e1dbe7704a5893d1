import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AdminModule } from './admin/admin.module';
import { AppointmentModule } from './appointment/appointment.module';
import { AuthModule } from './auth/auth.module';
import { configurations, databaseConfig, mongoConfig } from './config/configuration';
import { validateEnvironment } from './config/env.validation';
import { DoctorModule } from './doctor/doctor.module';
import { Admin } from './entities/admin.entity';
import { Appointment } from './entities/appointment.entity';
import { Doctor } from './entities/doctor.entity';
import { Patient } from './entities/patient.entity';
import { PatientModule } from './patient/patient.module';
import { PrescriptionModule } from './prescription/prescription.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: configurations,
      validate: validateEnvironment,
    }),
    TypeOrmModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (database: ConfigType<typeof databaseConfig>) => ({
        type: 'postgres',
        url: database.url,
        entities: [Admin, Doctor, Patient, Appointment],
        synchronize: database.synchronize,
      }),
    }),
    MongooseModule.forRootAsync({
      inject: [mongoConfig.KEY],
      useFactory: (mongo: ConfigType<typeof mongoConfig>) => ({ uri: mongo.uri }),
    }),
    AuthModule,
    AdminModule,
    DoctorModule,
    PatientModule,
    AppointmentModule,
    PrescriptionModule,
  ],
})
export class AppModule {}
