import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Admin } from '../../entities/admin.entity';
import { Role } from '../role.enum';
import { RoleAuthorizer } from './role-authorizer.interface';

@Injectable()
export class AdminAuthorizer implements RoleAuthorizer {
  readonly role = Role.ADMIN;

  constructor(@InjectRepository(Admin) private readonly adminRepository: Repository<Admin>) {}

  async resolveAccountId(username: string): Promise<number | null> {
    const admin = await this.adminRepository.findOne({ where: { username }, select: { id: true } });
    return admin ? admin.id : null;
  }
}
