import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Doctor } from '../../entities/doctor.entity';
import { Role } from '../role.enum';
import { RoleAuthorizer } from './role-authorizer.interface';

@Injectable()
export class DoctorAuthorizer implements RoleAuthorizer {
  readonly role = Role.DOCTOR;

  constructor(@InjectRepository(Doctor) private readonly doctorRepository: Repository<Doctor>) {}

  async resolveAccountId(email: string): Promise<number | null> {
    const doctor = await this.doctorRepository.findOne({ where: { email }, select: { id: true } });
    return doctor ? doctor.id : null;
  }
}
