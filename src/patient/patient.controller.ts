import { Body, Controller, Delete, Get, Param, ParseIntPipe, Post, Query, UnauthorizedException, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentAccount } from '../auth/decorators/current-account.decorator';
import { Roles } from '../auth/decorators/roles.decorator';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedAccount } from '../auth/interfaces/authenticated-account.interface';
import { Role } from '../auth/role.enum';
import { CreatePatientDto } from './dto/create-patient.dto';
import { FilterAppointmentsDto } from './dto/filter-appointments.dto';
import { PatientService } from './patient.service';

@ApiTags('patients')
@Controller('patients')
@UseGuards(JwtAuthGuard)
export class PatientController {
  constructor(private readonly patientService: PatientService) {}

  @Post()
  @ApiOperation({ summary: 'Register a patient' })
  async createPatient(@Body() createPatientDto: CreatePatientDto) {
    const patient = await this.patientService.register(createPatientDto);
    return { message: 'Signup successful', data: patient };
  }

  @Get('me')
  @Roles(Role.PATIENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Profile of the calling patient' })
  async getProfile(@CurrentAccount() account: AuthenticatedAccount) {
    const patient = await this.patientService.getDetails(account.accountId);
    return { message: 'Patient details retrieved successfully', data: patient };
  }

  @Get('me/appointments')
  @Roles(Role.PATIENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: "The calling patient's appointments, optionally filtered" })
  async filterAppointments(@CurrentAccount() account: AuthenticatedAccount, @Query() filters: FilterAppointmentsDto) {
    const appointments = await this.patientService.filterAppointments(
      account.accountId,
      filters.condition,
      filters.doctorName
    );
    return { message: 'Appointments retrieved successfully', data: appointments };
  }

  @Get(':patientId/appointments')
  @Roles(Role.DOCTOR, Role.PATIENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Appointment history of a patient' })
  async getAppointments(
    @CurrentAccount() account: AuthenticatedAccount,
    @Param('patientId', ParseIntPipe) patientId: number
  ) {
    if (account.role === Role.PATIENT && account.accountId !== patientId) {
      throw new UnauthorizedException('Unauthorized: Patient ID mismatch.');
    }
    const appointments = await this.patientService.getAppointments(patientId);
    return { message: 'Appointments retrieved successfully', data: appointments };
  }

  @Delete(':id')
  @Roles(Role.ADMIN)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Delete a patient without appointments' })
  async deletePatient(@Param('id', ParseIntPipe) id: number) {
    await this.patientService.remove(id);
    return { message: 'Patient deleted successfully' };
  }
}
