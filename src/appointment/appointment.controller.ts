import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentAccount } from '../auth/decorators/current-account.decorator';
import { Roles } from '../auth/decorators/roles.decorator';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedAccount } from '../auth/interfaces/authenticated-account.interface';
import { Role } from '../auth/role.enum';
import { throwFailure } from '../common/result';
import { calendarDate, dayBounds, isWholeMinute, timeOfDay } from '../common/scheduling';
import { AppointmentValidatorService } from './appointment-validator.service';
import { AppointmentService } from './appointment.service';
import { toAppointmentView } from './appointment.view';
import { CreateAppointmentDto } from './dto/create-appointment.dto';
import { ListAppointmentsDto } from './dto/list-appointments.dto';
import { UpdateAppointmentDto } from './dto/update-appointment.dto';

@ApiTags('appointments')
@ApiBearerAuth()
@Controller('appointments')
@UseGuards(JwtAuthGuard)
export class AppointmentController {
  constructor(
    private readonly appointmentService: AppointmentService,
    private readonly appointmentValidator: AppointmentValidatorService
  ) {}

  @Get()
  @Roles(Role.DOCTOR)
  @ApiOperation({ summary: "The calling doctor's appointments on a date" })
  async getAppointments(@CurrentAccount() account: AuthenticatedAccount, @Query() query: ListAppointmentsDto) {
    const { startOfDay, endOfDay } = dayBounds(query.date);
    const appointments = await this.appointmentService.listForDoctor(
      account.accountId,
      startOfDay,
      endOfDay,
      query.patientName
    );
    return { message: 'Appointments retrieved successfully', data: appointments.map(toAppointmentView) };
  }

  @Post()
  @Roles(Role.PATIENT)
  @ApiOperation({ summary: 'Book an appointment for the calling patient' })
  async bookAppointment(@CurrentAccount() account: AuthenticatedAccount, @Body() dto: CreateAppointmentDto) {
    const appointmentTime = new Date(dto.appointmentTime);
    const validation = await this.appointmentValidator.validate(
      dto.doctorId,
      calendarDate(appointmentTime),
      timeOfDay(appointmentTime)
    );
    if (validation === 'DoctorNotFound') {
      throw new BadRequestException('Invalid doctor ID.');
    }
    // a booking starts exactly on a slot minute
    if (validation === 'SlotTaken' || !isWholeMinute(appointmentTime)) {
      throw new ConflictException('Requested time slot is not available.');
    }

    const appointment = throwFailure(
      await this.appointmentService.book({ doctorId: dto.doctorId, patientId: account.accountId, appointmentTime })
    );
    return {
      message: 'Appointment booked successfully.',
      data: {
        id: appointment.id,
        doctorId: dto.doctorId,
        patientId: account.accountId,
        appointmentTime: appointmentTime.toISOString(),
        durationMinutes: appointment.durationMinutes,
        status: appointment.status,
      },
    };
  }

  @Put(':id')
  @Roles(Role.PATIENT)
  @ApiOperation({ summary: 'Reschedule an appointment of the calling patient' })
  async updateAppointment(
    @CurrentAccount() account: AuthenticatedAccount,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateAppointmentDto
  ) {
    const appointment = throwFailure(
      await this.appointmentService.update(id, account.accountId, {
        doctorId: dto.doctorId,
        appointmentTime: new Date(dto.appointmentTime),
        status: dto.status,
      })
    );
    return { message: 'Appointment updated successfully.', data: toAppointmentView(appointment) };
  }

  @Delete(':id')
  @Roles(Role.PATIENT)
  @ApiOperation({ summary: 'Cancel an appointment of the calling patient' })
  async cancelAppointment(@CurrentAccount() account: AuthenticatedAccount, @Param('id', ParseIntPipe) id: number) {
    throwFailure(await this.appointmentService.cancel(id, account.accountId));
    return { message: 'Appointment cancelled successfully.' };
  }
}
