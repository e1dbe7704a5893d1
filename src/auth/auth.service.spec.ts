import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import * as bcrypt from 'bcryptjs';
import { Admin } from '../entities/admin.entity';
import { Doctor } from '../entities/doctor.entity';
import { Patient } from '../entities/patient.entity';
import { AuthService } from './auth.service';
import { TokenService } from './token.service';

describe('AuthService', () => {
  const passwordHash = bcrypt.hashSync('Secret@123', 4);
  const adminRepository = { findOne: jest.fn() };
  const doctorRepository = { findOne: jest.fn() };
  const patientRepository = { findOne: jest.fn() };
  const tokenService = { issue: jest.fn((identity: string) => `token-for-${identity}`) };
  let authService: AuthService;

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        AuthService,
        { provide: getRepositoryToken(Admin), useValue: adminRepository },
        { provide: getRepositoryToken(Doctor), useValue: doctorRepository },
        { provide: getRepositoryToken(Patient), useValue: patientRepository },
        { provide: TokenService, useValue: tokenService },
      ],
    }).compile();
    authService = moduleRef.get(AuthService);
  });

  it('issues a token for an admin with the right password', async () => {
    adminRepository.findOne.mockResolvedValue({ id: 1, username: 'admin', password: passwordHash });

    await expect(authService.validateAdmin('admin', 'Secret@123')).resolves.toEqual({
      ok: true,
      value: { token: 'token-for-admin' },
    });
  });

  it('issues a doctor token keyed by email', async () => {
    doctorRepository.findOne.mockResolvedValue({ id: 7, email: 'doctor@example.com', password: passwordHash });

    const result = await authService.validateDoctor('doctor@example.com', 'Secret@123');

    expect(result.ok && result.value.token).toBe('token-for-doctor@example.com');
    expect(doctorRepository.findOne).toHaveBeenCalledWith({
      where: { email: 'doctor@example.com' },
      select: { id: true, email: true, password: true },
    });
  });

  it('rejects a wrong password', async () => {
    patientRepository.findOne.mockResolvedValue({ id: 3, email: 'patient@example.com', password: passwordHash });

    await expect(authService.validatePatient('patient@example.com', 'Wrong@123')).resolves.toEqual({
      ok: false,
      failure: { kind: 'AuthFailure', reason: 'InvalidCredentials', message: 'Invalid credentials' },
    });
    expect(tokenService.issue).not.toHaveBeenCalled();
  });

  it('rejects an unknown account', async () => {
    patientRepository.findOne.mockResolvedValue(null);

    const result = await authService.validatePatient('ghost@example.com', 'Secret@123');

    expect(!result.ok && result.failure.reason).toBe('InvalidCredentials');
  });
});
