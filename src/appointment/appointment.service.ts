import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, DataSource, FindOptionsWhere, ILike, Repository } from 'typeorm';
import { errorMessage, isWriteConflict } from '../common/database-errors';
import { blankToUndefined, containsPattern } from '../common/query';
import { fail, ok, Result } from '../common/result';
import { APPOINTMENT_DURATION_MINUTES } from '../common/scheduling';
import { Appointment, AppointmentStatus } from '../entities/appointment.entity';
import { Doctor } from '../entities/doctor.entity';
import { AppointmentValidatorService } from './appointment-validator.service';

export type BookFailureReason = 'SlotConflict' | 'PersistenceError';
export type UpdateFailureReason = 'NotFound' | 'OwnershipMismatch' | 'DoctorNotFound' | 'SlotConflict' | 'PersistenceError';
export type CancelFailureReason = 'NotFound' | 'OwnershipMismatch';

export interface NewAppointment {
  doctorId: number;
  patientId: number;
  appointmentTime: Date;
}

export interface AppointmentChanges {
  doctorId: number;
  appointmentTime: Date;
  status?: AppointmentStatus;
}

@Injectable()
export class AppointmentService {
  private readonly logger = new Logger(AppointmentService.name);

  constructor(
    @InjectRepository(Appointment) private readonly appointmentRepository: Repository<Appointment>,
    private readonly dataSource: DataSource,
    private readonly appointmentValidator: AppointmentValidatorService
  ) {}

  /** Inserts the appointment as given; slot validation is the caller's job. */
  async book(newAppointment: NewAppointment): Promise<Result<Appointment, BookFailureReason>> {
    try {
      const appointment = this.appointmentRepository.create({
        doctor: { id: newAppointment.doctorId },
        patient: { id: newAppointment.patientId },
        appointmentTime: newAppointment.appointmentTime,
        durationMinutes: APPOINTMENT_DURATION_MINUTES,
        status: AppointmentStatus.SCHEDULED,
      });
      const saved = await this.appointmentRepository.save(appointment);
      this.logger.log(
        `Booked appointment ${saved.id} with doctor ${newAppointment.doctorId} at ${newAppointment.appointmentTime.toISOString()}`
      );
      return ok(saved);
    } catch (error) {
      return this.writeFailure('book', error);
    }
  }

  /**
   * Moves an appointment owned by the patient to a new time and doctor. The
   * overlap check and the write share one serializable transaction.
   */
  async update(
    appointmentId: number,
    requestingPatientId: number,
    changes: AppointmentChanges
  ): Promise<Result<Appointment, UpdateFailureReason>> {
    try {
      return await this.dataSource.transaction(
        'SERIALIZABLE',
        async (manager): Promise<Result<Appointment, UpdateFailureReason>> => {
          const repository = manager.getRepository(Appointment);
          const existing = await repository.findOne({
            where: { id: appointmentId },
            relations: { doctor: true, patient: true },
          });
          if (!existing) {
            return fail('NotFound', 'NotFound', 'Appointment not found.');
          }
          if (existing.patient.id !== requestingPatientId) {
            return fail('AuthFailure', 'OwnershipMismatch', 'Unauthorized: Patient ID mismatch.');
          }

          const doctor = await manager.getRepository(Doctor).findOne({ where: { id: changes.doctorId } });
          if (!doctor) {
            return fail('ValidationFailure', 'DoctorNotFound', 'Invalid doctor ID.');
          }
          if (await this.appointmentValidator.hasOverlap(doctor.id, changes.appointmentTime, existing.id, manager)) {
            return fail('Conflict', 'SlotConflict', 'Doctor not available at this time.');
          }

          existing.appointmentTime = changes.appointmentTime;
          existing.doctor = doctor;
          if (changes.status !== undefined) {
            existing.status = changes.status;
          }
          const saved = await repository.save(existing);
          this.logger.log(`Updated appointment ${saved.id} to doctor ${doctor.id} at ${changes.appointmentTime.toISOString()}`);
          return ok(saved);
        }
      );
    } catch (error) {
      return this.writeFailure('update', error);
    }
  }

  async cancel(appointmentId: number, requestingPatientId: number): Promise<Result<void, CancelFailureReason>> {
    return this.dataSource.transaction(async (manager): Promise<Result<void, CancelFailureReason>> => {
      const repository = manager.getRepository(Appointment);
      const existing = await repository.findOne({ where: { id: appointmentId }, relations: { patient: true } });
      if (!existing) {
        return fail('NotFound', 'NotFound', 'Appointment not found.');
      }
      if (existing.patient.id !== requestingPatientId) {
        this.logger.warn(`Patient ${requestingPatientId} tried to cancel appointment ${appointmentId}`);
        return fail('AuthFailure', 'OwnershipMismatch', 'Unauthorized: Patient ID mismatch.');
      }

      await repository.delete({ id: appointmentId });
      this.logger.log(`Cancelled appointment ${appointmentId}`);
      return ok(undefined);
    });
  }

  listForDoctor(doctorId: number, startOfDay: Date, endOfDay: Date, patientName?: string): Promise<Appointment[]> {
    const where: FindOptionsWhere<Appointment> = {
      doctor: { id: doctorId },
      appointmentTime: Between(startOfDay, endOfDay),
    };
    const name = blankToUndefined(patientName);
    if (name) {
      where.patient = { name: ILike(containsPattern(name)) };
    }

    return this.appointmentRepository.find({
      where,
      relations: { doctor: true, patient: true },
      order: { appointmentTime: 'ASC' },
    });
  }

  /** Overwrites the status without an ownership check; callers authorize first. */
  async setStatus(appointmentId: number, status: AppointmentStatus): Promise<Result<void, 'NotFound'>> {
    const result = await this.appointmentRepository.update({ id: appointmentId }, { status });
    if (!result.affected) {
      return fail('NotFound', 'NotFound', 'Appointment not found.');
    }
    return ok(undefined);
  }

  findById(appointmentId: number): Promise<Appointment | null> {
    return this.appointmentRepository.findOne({
      where: { id: appointmentId },
      relations: { doctor: true, patient: true },
    });
  }

  private writeFailure(operation: string, error: unknown) {
    if (isWriteConflict(error)) {
      this.logger.warn(`Concurrent ${operation} lost a race for the same slot`);
      return fail('Conflict', 'SlotConflict', 'Requested time slot is not available.');
    }
    this.logger.error(`Failed to ${operation} appointment: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
    return fail('PersistenceFailure', 'PersistenceError', `Failed to ${operation} appointment.`);
  }
}
