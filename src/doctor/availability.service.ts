import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, Not, Repository } from 'typeorm';
import { dayBounds, timeOfDay } from '../common/scheduling';
import { schedulingConfig } from '../config/configuration';
import { Appointment, AppointmentStatus } from '../entities/appointment.entity';
import { Doctor } from '../entities/doctor.entity';

@Injectable()
export class AvailabilityService {
  private readonly logger = new Logger(AvailabilityService.name);

  constructor(
    @InjectRepository(Appointment) private readonly appointmentRepository: Repository<Appointment>,
    @Inject(schedulingConfig.KEY) private readonly scheduling: ConfigType<typeof schedulingConfig>
  ) {}

  /**
   * Template slots not taken by one of the doctor's appointments on `date`
   * (YYYY-MM-DD, UTC), in template order. The doctor is not looked up.
   */
  async availability(doctorId: number, date: string, template: string[]): Promise<string[]> {
    const { startOfDay, endOfDay } = dayBounds(date);
    const booked = await this.appointmentRepository.find({
      where: {
        doctor: { id: doctorId },
        appointmentTime: Between(startOfDay, endOfDay),
        status: Not(AppointmentStatus.CANCELLED),
      },
    });

    const bookedSlots = new Set(booked.map((appointment) => timeOfDay(appointment.appointmentTime)));
    this.logger.debug(`Doctor ${doctorId} has ${bookedSlots.size} booked slot(s) on ${date}`);
    return template.filter((slot) => !bookedSlots.has(slot));
  }

  /** Free slots of the clinic template that the doctor has configured as available. */
  availabilityForDoctor(doctor: Doctor, date: string): Promise<string[]> {
    const configured = new Set(doctor.availableTimes);
    const template = this.scheduling.slotTemplate.filter((slot) => configured.has(slot));
    return this.availability(doctor.id, date, template);
  }
}
