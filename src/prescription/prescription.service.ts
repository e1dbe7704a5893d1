import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Prescription, PrescriptionDocument } from '../schemas/prescription.schema';
import { CreatePrescriptionDto } from './dto/create-prescription.dto';

const DUPLICATE_KEY = 11000;

function isDuplicateKey(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY;
}

@Injectable()
export class PrescriptionService {
  private readonly logger = new Logger(PrescriptionService.name);

  constructor(@InjectModel(Prescription.name) private readonly prescriptionModel: Model<PrescriptionDocument>) {}

  async create(createPrescriptionDto: CreatePrescriptionDto) {
    const existing = await this.prescriptionModel.findOne({ appointmentId: createPrescriptionDto.appointmentId }).exec();
    if (existing) {
      throw new ConflictException('Prescription already exists for this appointment');
    }

    try {
      const prescription = await this.prescriptionModel.create(createPrescriptionDto);
      this.logger.log(`Saved prescription for appointment ${createPrescriptionDto.appointmentId}`);
      return prescription;
    } catch (error) {
      if (isDuplicateKey(error)) {
        throw new ConflictException('Prescription already exists for this appointment');
      }
      throw error;
    }
  }

  async removeByAppointmentId(appointmentId: number): Promise<void> {
    await this.prescriptionModel.deleteOne({ appointmentId }).exec();
    this.logger.warn(`Removed prescription for appointment ${appointmentId}`);
  }

  findByAppointmentId(appointmentId: number) {
    return this.prescriptionModel.findOne({ appointmentId }).exec();
  }
}
