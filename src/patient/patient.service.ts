import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import * as bcrypt from 'bcryptjs';
import { FindOptionsWhere, ILike, Repository } from 'typeorm';
import { AppointmentView, toAppointmentView } from '../appointment/appointment.view';
import { containsPattern } from '../common/query';
import { Appointment, AppointmentStatus } from '../entities/appointment.entity';
import { Patient } from '../entities/patient.entity';
import { CreatePatientDto } from './dto/create-patient.dto';
import { AppointmentCondition } from './dto/filter-appointments.dto';

export type PatientProfile = Omit<Patient, 'password'>;

const CONDITION_STATUS: Record<AppointmentCondition, AppointmentStatus> = {
  future: AppointmentStatus.SCHEDULED,
  past: AppointmentStatus.COMPLETED,
};

@Injectable()
export class PatientService {
  private readonly logger = new Logger(PatientService.name);

  constructor(
    @InjectRepository(Patient) private readonly patientRepository: Repository<Patient>,
    @InjectRepository(Appointment) private readonly appointmentRepository: Repository<Appointment>
  ) {}

  async register(createPatientDto: CreatePatientDto): Promise<PatientProfile> {
    const existing = await this.patientRepository.findOne({
      where: [{ email: createPatientDto.email }, { phone: createPatientDto.phone }],
    });
    if (existing) {
      throw new ConflictException('Patient with this email or phone number already exists');
    }

    const patient = this.patientRepository.create({
      ...createPatientDto,
      password: await bcrypt.hash(createPatientDto.password, 10),
    });
    const saved = await this.patientRepository.save(patient);
    this.logger.log(`Registered patient ${saved.id} (${saved.email})`);

    const { password: _password, ...profile } = saved;
    return profile;
  }

  async getDetails(patientId: number): Promise<PatientProfile> {
    const patient = await this.patientRepository.findOne({ where: { id: patientId } });
    if (!patient) {
      throw new NotFoundException('Patient not found');
    }
    return patient;
  }

  getAppointments(patientId: number): Promise<AppointmentView[]> {
    return this.findAppointments({ patient: { id: patientId } });
  }

  filterAppointments(patientId: number, condition?: AppointmentCondition, doctorName?: string): Promise<AppointmentView[]> {
    if (condition && doctorName) {
      return this.findAppointments({
        patient: { id: patientId },
        status: CONDITION_STATUS[condition],
        doctor: { name: ILike(containsPattern(doctorName)) },
      });
    } else if (doctorName) {
      return this.findAppointments({ patient: { id: patientId }, doctor: { name: ILike(containsPattern(doctorName)) } });
    } else if (condition) {
      return this.findAppointments({ patient: { id: patientId }, status: CONDITION_STATUS[condition] });
    }
    return this.getAppointments(patientId);
  }

  /** Refused while the patient still has appointments on record. */
  async remove(patientId: number): Promise<void> {
    const patient = await this.patientRepository.findOne({ where: { id: patientId } });
    if (!patient) {
      throw new NotFoundException('Patient not found');
    }

    const appointmentCount = await this.appointmentRepository.count({ where: { patient: { id: patientId } } });
    if (appointmentCount > 0) {
      throw new ConflictException('Patient has appointments and cannot be deleted');
    }

    await this.patientRepository.delete({ id: patientId });
    this.logger.log(`Deleted patient ${patientId}`);
  }

  private async findAppointments(where: FindOptionsWhere<Appointment>): Promise<AppointmentView[]> {
    const appointments = await this.appointmentRepository.find({
      where,
      relations: { doctor: true, patient: true },
      order: { appointmentTime: 'ASC' },
    });
    return appointments.map(toAppointmentView);
  }
}
