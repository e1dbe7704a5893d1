import {
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  UnauthorizedException,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { AppointmentService } from '../appointment/appointment.service';
import { CurrentAccount } from '../auth/decorators/current-account.decorator';
import { Roles } from '../auth/decorators/roles.decorator';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedAccount } from '../auth/interfaces/authenticated-account.interface';
import { Role } from '../auth/role.enum';
import { throwFailure } from '../common/result';
import { AppointmentStatus } from '../entities/appointment.entity';
import { CreatePrescriptionDto } from './dto/create-prescription.dto';
import { PrescriptionService } from './prescription.service';

@ApiTags('prescriptions')
@ApiBearerAuth()
@Controller('prescriptions')
@UseGuards(JwtAuthGuard)
export class PrescriptionController {
  constructor(
    private readonly prescriptionService: PrescriptionService,
    private readonly appointmentService: AppointmentService
  ) {}

  @Post()
  @Roles(Role.DOCTOR)
  @ApiOperation({ summary: 'Write the prescription of an appointment and mark it completed' })
  async savePrescription(@CurrentAccount() account: AuthenticatedAccount, @Body() dto: CreatePrescriptionDto) {
    const appointment = await this.appointmentService.findById(dto.appointmentId);
    if (!appointment) {
      throw new NotFoundException('Appointment not found.');
    }
    if (appointment.doctor.id !== account.accountId) {
      throw new UnauthorizedException('Unauthorized: Doctor ID mismatch.');
    }

    const prescription = await this.prescriptionService.create(dto);
    const completed = await this.appointmentService.setStatus(dto.appointmentId, AppointmentStatus.COMPLETED);
    if (!completed.ok) {
      await this.prescriptionService.removeByAppointmentId(dto.appointmentId);
      throwFailure(completed);
    }
    return { message: 'Prescription saved', data: prescription };
  }

  @Get(':appointmentId')
  @Roles(Role.DOCTOR)
  @ApiOperation({ summary: 'Prescription of an appointment' })
  async getPrescription(@Param('appointmentId', ParseIntPipe) appointmentId: number) {
    const prescription = await this.prescriptionService.findByAppointmentId(appointmentId);
    if (!prescription) {
      throw new NotFoundException('No prescription found for this appointment');
    }
    return { message: 'Prescription retrieved successfully', data: prescription };
  }
}
