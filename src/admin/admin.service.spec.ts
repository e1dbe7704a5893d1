import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import * as bcrypt from 'bcryptjs';
import { adminConfig } from '../config/configuration';
import { Admin } from '../entities/admin.entity';
import { AdminService } from './admin.service';

describe('AdminService', () => {
  const adminRepository = {
    findOne: jest.fn(),
    create: jest.fn((admin: Partial<Admin>) => admin),
    save: jest.fn(async (admin: Partial<Admin>) => admin),
  };

  async function serviceWith(username?: string, password?: string): Promise<AdminService> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        AdminService,
        { provide: getRepositoryToken(Admin), useValue: adminRepository },
        { provide: adminConfig.KEY, useValue: { username, password } },
      ],
    }).compile();
    return moduleRef.get(AdminService);
  }

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('creates the configured admin with a hashed password', async () => {
    adminRepository.findOne.mockResolvedValue(null);
    const service = await serviceWith('admin', 'test-secret');

    await expect(service.seed()).resolves.toBe(true);
    const stored = adminRepository.save.mock.calls[0][0];
    expect(stored.username).toBe('admin');
    expect(bcrypt.compareSync('test-secret', stored.password ?? '')).toBe(true);
  });

  it('keeps an existing admin', async () => {
    adminRepository.findOne.mockResolvedValue({ id: 1, username: 'admin' });
    const service = await serviceWith('admin', 'test-secret');

    await expect(service.seed()).resolves.toBe(false);
    expect(adminRepository.save).not.toHaveBeenCalled();
  });

  it('skips seeding without credentials', async () => {
    const service = await serviceWith();

    await expect(service.seed()).resolves.toBe(false);
    expect(adminRepository.findOne).not.toHaveBeenCalled();
  });
});
