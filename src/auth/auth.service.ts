import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import * as bcrypt from 'bcryptjs';
import { Repository } from 'typeorm';
import { fail, ok, Result } from '../common/result';
import { Admin } from '../entities/admin.entity';
import { Doctor } from '../entities/doctor.entity';
import { Patient } from '../entities/patient.entity';
import { Role } from './role.enum';
import { TokenService } from './token.service';

export interface IssuedToken {
  token: string;
}

interface StoredCredential {
  identity: string;
  password: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(Admin) private readonly adminRepository: Repository<Admin>,
    @InjectRepository(Doctor) private readonly doctorRepository: Repository<Doctor>,
    @InjectRepository(Patient) private readonly patientRepository: Repository<Patient>,
    private readonly tokenService: TokenService
  ) {}

  async validateAdmin(username: string, password: string): Promise<Result<IssuedToken, 'InvalidCredentials'>> {
    const admin = await this.adminRepository.findOne({
      where: { username },
      select: { id: true, username: true, password: true },
    });
    return this.issueToken(Role.ADMIN, username, admin ? { identity: admin.username, password: admin.password } : null, password);
  }

  async validateDoctor(email: string, password: string): Promise<Result<IssuedToken, 'InvalidCredentials'>> {
    const doctor = await this.doctorRepository.findOne({
      where: { email },
      select: { id: true, email: true, password: true },
    });
    return this.issueToken(Role.DOCTOR, email, doctor ? { identity: doctor.email, password: doctor.password } : null, password);
  }

  async validatePatient(email: string, password: string): Promise<Result<IssuedToken, 'InvalidCredentials'>> {
    const patient = await this.patientRepository.findOne({
      where: { email },
      select: { id: true, email: true, password: true },
    });
    return this.issueToken(Role.PATIENT, email, patient ? { identity: patient.email, password: patient.password } : null, password);
  }

  private async issueToken(
    role: Role,
    attemptedIdentity: string,
    credential: StoredCredential | null,
    password: string
  ): Promise<Result<IssuedToken, 'InvalidCredentials'>> {
    if (!credential || !(await bcrypt.compare(password, credential.password))) {
      this.logger.warn(`Failed ${role} login for ${attemptedIdentity}`);
      return fail('AuthFailure', 'InvalidCredentials', 'Invalid credentials');
    }

    this.logger.log(`${role} ${credential.identity} logged in`);
    return ok({ token: this.tokenService.issue(credential.identity) });
  }
}
