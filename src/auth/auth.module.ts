import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { TypeOrmModule } from '@nestjs/typeorm';
import { jwtConfig } from '../config/configuration';
import { Admin } from '../entities/admin.entity';
import { Doctor } from '../entities/doctor.entity';
import { Patient } from '../entities/patient.entity';
import { AccessGateway } from './access-gateway.service';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { AdminAuthorizer } from './authorizers/admin.authorizer';
import { DoctorAuthorizer } from './authorizers/doctor.authorizer';
import { PatientAuthorizer } from './authorizers/patient.authorizer';
import { RoleAuthorizer, ROLE_AUTHORIZERS } from './authorizers/role-authorizer.interface';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { TokenService } from './token.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Admin, Doctor, Patient]),
    JwtModule.registerAsync({
      inject: [jwtConfig.KEY],
      useFactory: (config: ConfigType<typeof jwtConfig>) => ({
        secret: config.secret,
        signOptions: { expiresIn: config.expiresInSeconds },
      }),
    }),
  ],
  controllers: [AuthController],
  providers: [
    AdminAuthorizer,
    DoctorAuthorizer,
    PatientAuthorizer,
    {
      provide: ROLE_AUTHORIZERS,
      useFactory: (...authorizers: RoleAuthorizer[]) => authorizers,
      inject: [AdminAuthorizer, DoctorAuthorizer, PatientAuthorizer],
    },
    TokenService,
    AccessGateway,
    AuthService,
    JwtAuthGuard,
  ],
  exports: [TokenService, AccessGateway, JwtAuthGuard],
})
export class AuthModule {}
