import { BadRequestException, ConflictException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import * as bcrypt from 'bcryptjs';
import { DataSource, ILike, Not, Repository } from 'typeorm';
import { containsPattern, escapeLike } from '../common/query';
import { schedulingConfig } from '../config/configuration';
import { Appointment } from '../entities/appointment.entity';
import { Doctor } from '../entities/doctor.entity';
import { CreateDoctorDto } from './dto/create-doctor.dto';
import { UpdateDoctorDto } from './dto/update-doctor.dto';

export type DoctorProfile = Omit<Doctor, 'password'>;

@Injectable()
export class DoctorService {
  private readonly logger = new Logger(DoctorService.name);

  constructor(
    @InjectRepository(Doctor) private readonly doctorRepository: Repository<Doctor>,
    private readonly dataSource: DataSource,
    @Inject(schedulingConfig.KEY) private readonly scheduling: ConfigType<typeof schedulingConfig>
  ) {}

  async create(createDoctorDto: CreateDoctorDto): Promise<DoctorProfile> {
    const existing = await this.doctorRepository.findOne({ where: { email: createDoctorDto.email } });
    if (existing) {
      throw new ConflictException('Doctor already exists with this email');
    }

    const doctor = this.doctorRepository.create({
      name: createDoctorDto.name,
      email: createDoctorDto.email,
      password: await bcrypt.hash(createDoctorDto.password, 10),
      phone: createDoctorDto.phone,
      specialty: createDoctorDto.specialty,
      availableTimes: this.orderAvailableTimes(createDoctorDto.availableTimes),
    });

    const saved = await this.doctorRepository.save(doctor);
    this.logger.log(`Registered doctor ${saved.id} (${saved.email})`);
    return this.toProfile(saved);
  }

  async update(id: number, updateDoctorDto: UpdateDoctorDto): Promise<DoctorProfile> {
    const doctor = await this.doctorRepository.findOne({ where: { id } });
    if (!doctor) {
      throw new NotFoundException('Doctor not found');
    }

    if (updateDoctorDto.email && updateDoctorDto.email !== doctor.email) {
      const clash = await this.doctorRepository.findOne({ where: { email: updateDoctorDto.email, id: Not(id) } });
      if (clash) {
        throw new ConflictException('Doctor already exists with this email');
      }
      doctor.email = updateDoctorDto.email;
    }
    if (updateDoctorDto.name !== undefined) {
      doctor.name = updateDoctorDto.name;
    }
    if (updateDoctorDto.phone !== undefined) {
      doctor.phone = updateDoctorDto.phone;
    }
    if (updateDoctorDto.specialty !== undefined) {
      doctor.specialty = updateDoctorDto.specialty;
    }
    if (updateDoctorDto.availableTimes !== undefined) {
      doctor.availableTimes = this.orderAvailableTimes(updateDoctorDto.availableTimes);
    }
    if (updateDoctorDto.password) {
      doctor.password = await bcrypt.hash(updateDoctorDto.password, 10);
    }

    const saved = await this.doctorRepository.save(doctor);
    this.logger.log(`Updated doctor ${saved.id}`);
    return this.toProfile(saved);
  }

  /** Deletes the doctor together with every appointment booked with them. */
  async remove(id: number): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      const doctor = await manager.findOne(Doctor, { where: { id } });
      if (!doctor) {
        throw new NotFoundException('Doctor not found');
      }

      const appointments = await manager.find(Appointment, { where: { doctor: { id } } });
      await manager.remove(appointments);
      await manager.delete(Doctor, { id });
      this.logger.log(`Deleted doctor ${id} and ${appointments.length} appointment(s)`);
    });
  }

  findAll(): Promise<Doctor[]> {
    return this.doctorRepository.find({ order: { id: 'ASC' } });
  }

  findById(id: number): Promise<Doctor | null> {
    return this.doctorRepository.findOne({ where: { id } });
  }

  findByName(name: string): Promise<Doctor[]> {
    return this.doctorRepository.find({ where: { name: ILike(containsPattern(name)) }, order: { id: 'ASC' } });
  }

  findBySpecialty(specialty: string): Promise<Doctor[]> {
    return this.doctorRepository.find({ where: { specialty: ILike(escapeLike(specialty)) }, order: { id: 'ASC' } });
  }

  findByNameAndSpecialty(name: string, specialty: string): Promise<Doctor[]> {
    return this.doctorRepository.find({
      where: { name: ILike(containsPattern(name)), specialty: ILike(escapeLike(specialty)) },
      order: { id: 'ASC' },
    });
  }

  /** Checks every slot against the clinic template and returns them in template order. */
  private orderAvailableTimes(availableTimes: string[]): string[] {
    const template = this.scheduling.slotTemplate;
    const outside = availableTimes.filter((slot) => !template.includes(slot));
    if (outside.length > 0) {
      throw new BadRequestException(
        `Available times must be clinic slots (${template.join(', ')}); got ${outside.join(', ')}`
      );
    }
    const requested = new Set(availableTimes);
    return template.filter((slot) => requested.has(slot));
  }

  private toProfile(doctor: Doctor): DoctorProfile {
    const { password: _password, ...profile } = doctor;
    return profile;
  }
}
