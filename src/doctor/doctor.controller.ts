import {
  Body,
  Controller,
  Delete,
  Get,
  Logger,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Roles } from '../auth/decorators/roles.decorator';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { Role } from '../auth/role.enum';
import { DateQueryDto } from '../common/dto/date-query.dto';
import { AvailabilityService } from './availability.service';
import { DoctorFilterService } from './doctor-filter.service';
import { DoctorService } from './doctor.service';
import { CreateDoctorDto } from './dto/create-doctor.dto';
import { FilterDoctorsDto } from './dto/filter-doctors.dto';
import { UpdateDoctorDto } from './dto/update-doctor.dto';

@ApiTags('doctors')
@Controller('doctors')
@UseGuards(JwtAuthGuard)
export class DoctorController {
  private readonly logger = new Logger(DoctorController.name);

  constructor(
    private readonly doctorService: DoctorService,
    private readonly doctorFilterService: DoctorFilterService,
    private readonly availabilityService: AvailabilityService
  ) {}

  @Get()
  @ApiOperation({ summary: 'List all doctors' })
  async getDoctors() {
    const doctors = await this.doctorService.findAll();
    return { message: 'Doctors retrieved successfully', data: doctors };
  }

  @Get('filter')
  @ApiOperation({ summary: 'Search doctors by name, specialty and AM/PM availability' })
  async filterDoctors(@Query() filters: FilterDoctorsDto) {
    const doctors = await this.doctorFilterService.filter(filters.name, filters.specialty, filters.time);
    return { message: 'Doctors retrieved successfully', data: doctors };
  }

  @Get(':doctorId/availability')
  @Roles(Role.ADMIN, Role.DOCTOR, Role.PATIENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Free slots of a doctor on a date' })
  async getAvailability(@Param('doctorId', ParseIntPipe) doctorId: number, @Query() query: DateQueryDto) {
    const doctor = await this.doctorService.findById(doctorId);
    if (!doctor) {
      throw new NotFoundException('Doctor not found');
    }

    const availableTimes = await this.availabilityService.availabilityForDoctor(doctor, query.date);
    this.logger.debug(`Doctor ${doctorId} has ${availableTimes.length} free slot(s) on ${query.date}`);
    return {
      message: 'Doctor availability retrieved successfully',
      data: { doctorId, date: query.date, availableTimes },
    };
  }

  @Post()
  @Roles(Role.ADMIN)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Register a doctor' })
  async createDoctor(@Body() createDoctorDto: CreateDoctorDto) {
    const doctor = await this.doctorService.create(createDoctorDto);
    return { message: 'Doctor registered successfully', data: doctor };
  }

  @Put(':id')
  @Roles(Role.ADMIN)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Update a doctor' })
  async updateDoctor(@Param('id', ParseIntPipe) id: number, @Body() updateDoctorDto: UpdateDoctorDto) {
    const doctor = await this.doctorService.update(id, updateDoctorDto);
    return { message: 'Doctor updated successfully', data: doctor };
  }

  @Delete(':id')
  @Roles(Role.ADMIN)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Delete a doctor and their appointments' })
  async deleteDoctor(@Param('id', ParseIntPipe) id: number) {
    await this.doctorService.remove(id);
    return { message: 'Doctor deleted successfully' };
  }
}
