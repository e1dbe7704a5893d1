import { Column, CreateDateColumn, Entity, Index, ManyToOne, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { APPOINTMENT_DURATION_MINUTES } from '../common/scheduling';
import { Doctor } from './doctor.entity';
import { Patient } from './patient.entity';

export enum AppointmentStatus {
  SCHEDULED = 0,
  COMPLETED = 1,
  CANCELLED = 2,
}

@Entity('appointments')
@Index(['doctor', 'appointmentTime'], { unique: true, where: '"status" <> 2' })
export class Appointment {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => Doctor, { nullable: false, onDelete: 'CASCADE' })
  doctor!: Doctor;

  @ManyToOne(() => Patient, { nullable: false, onDelete: 'RESTRICT' })
  patient!: Patient;

  @Column({ type: 'timestamptz' })
  appointmentTime!: Date;

  @Column({ type: 'int', default: APPOINTMENT_DURATION_MINUTES })
  durationMinutes!: number;

  @Column({ type: 'smallint', default: AppointmentStatus.SCHEDULED })
  status!: AppointmentStatus;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
