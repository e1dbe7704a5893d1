import { Body, Controller, Get, Headers, HttpCode, HttpStatus, Param, Post, UnauthorizedException } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { throwFailure } from '../common/result';
import { AuthService } from './auth.service';
import { extractBearerToken } from './bearer-token';
import { AdminLoginDto } from './dto/admin-login.dto';
import { LoginDto } from './dto/login.dto';
import { TokenService } from './token.service';

@ApiTags('auth')
@Controller('auth')
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly tokenService: TokenService
  ) {}

  @Post('admin/login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Log in as an admin' })
  async adminLogin(@Body() loginDto: AdminLoginDto) {
    const data = throwFailure(await this.authService.validateAdmin(loginDto.username, loginDto.password));
    return { message: 'Login successful', data };
  }

  @Post('doctor/login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Log in as a doctor' })
  async doctorLogin(@Body() loginDto: LoginDto) {
    const data = throwFailure(await this.authService.validateDoctor(loginDto.email, loginDto.password));
    return { message: 'Login successful', data };
  }

  @Post('patient/login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Log in as a patient' })
  async patientLogin(@Body() loginDto: LoginDto) {
    const data = throwFailure(await this.authService.validatePatient(loginDto.email, loginDto.password));
    return { message: 'Login successful', data };
  }

  @Get('validate/:role')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Check that the bearer token belongs to an account of the role' })
  async validate(@Param('role') role: string, @Headers('authorization') authorization?: string) {
    const token = extractBearerToken(authorization);
    if (!token) {
      throw new UnauthorizedException('No authentication token provided');
    }
    throwFailure(await this.tokenService.authorize(token, role));
    return { message: 'Valid token.' };
  }
}
