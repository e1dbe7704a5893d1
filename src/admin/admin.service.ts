import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import * as bcrypt from 'bcryptjs';
import { Repository } from 'typeorm';
import { adminConfig } from '../config/configuration';
import { Admin } from '../entities/admin.entity';

/** Creates the configured admin account on startup when it does not exist yet. */
@Injectable()
export class AdminService implements OnApplicationBootstrap {
  private readonly logger = new Logger(AdminService.name);

  constructor(
    @InjectRepository(Admin) private readonly adminRepository: Repository<Admin>,
    @Inject(adminConfig.KEY) private readonly admin: ConfigType<typeof adminConfig>
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.seed();
  }

  async seed(): Promise<boolean> {
    const { username, password } = this.admin;
    if (!username || !password) {
      this.logger.warn('ADMIN_USERNAME or ADMIN_PASSWORD not set; skipping admin seeding');
      return false;
    }

    const existing = await this.adminRepository.findOne({ where: { username } });
    if (existing) {
      return false;
    }

    await this.adminRepository.save(
      this.adminRepository.create({ username, password: await bcrypt.hash(password, 10) })
    );
    this.logger.log(`Seeded admin account ${username}`);
    return true;
  }
}
