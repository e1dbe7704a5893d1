import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Patient } from '../../entities/patient.entity';
import { Role } from '../role.enum';
import { RoleAuthorizer } from './role-authorizer.interface';

@Injectable()
export class PatientAuthorizer implements RoleAuthorizer {
  readonly role = Role.PATIENT;

  constructor(@InjectRepository(Patient) private readonly patientRepository: Repository<Patient>) {}

  async resolveAccountId(email: string): Promise<number | null> {
    const patient = await this.patientRepository.findOne({ where: { email }, select: { id: true } });
    return patient ? patient.id : null;
  }
}
