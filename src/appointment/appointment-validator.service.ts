import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, EntityManager, Not, Repository } from 'typeorm';
import { overlapWindow } from '../common/scheduling';
import { Appointment, AppointmentStatus } from '../entities/appointment.entity';
import { Doctor } from '../entities/doctor.entity';

export type AppointmentValidation = 'Valid' | 'SlotTaken' | 'DoctorNotFound';

@Injectable()
export class AppointmentValidatorService {
  private readonly logger = new Logger(AppointmentValidatorService.name);

  constructor(
    @InjectRepository(Doctor) private readonly doctorRepository: Repository<Doctor>,
    @InjectRepository(Appointment) private readonly appointmentRepository: Repository<Appointment>
  ) {}

  /**
   * Checks the proposed HH:mm slot against the doctor's configured available
   * times. Existing bookings are not consulted here.
   */
  async validate(doctorId: number, date: string, proposedSlot: string): Promise<AppointmentValidation> {
    const doctor = await this.doctorRepository.findOne({ where: { id: doctorId } });
    if (!doctor) {
      return 'DoctorNotFound';
    }

    const valid = (doctor.availableTimes ?? []).includes(proposedSlot);
    if (!valid) {
      this.logger.debug(`Slot ${proposedSlot} on ${date} is not offered by doctor ${doctorId}`);
    }
    return valid ? 'Valid' : 'SlotTaken';
  }

  /**
   * True when another live appointment of the doctor starts within 30 minutes
   * (inclusive) of `instant`. Pass the entity manager of an open transaction
   * to read inside it.
   */
  async hasOverlap(doctorId: number, instant: Date, excludeAppointmentId?: number, manager?: EntityManager): Promise<boolean> {
    const repository = manager ? manager.getRepository(Appointment) : this.appointmentRepository;
    const { from, to } = overlapWindow(instant);
    const nearby = await repository.find({
      where: {
        doctor: { id: doctorId },
        appointmentTime: Between(from, to),
        status: Not(AppointmentStatus.CANCELLED),
      },
    });
    return nearby.some((appointment) => appointment.id !== excludeAppointmentId);
  }
}
