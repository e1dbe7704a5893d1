import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';

export type PrescriptionDocument = Prescription & Document;

@Schema({ timestamps: true })
export class Prescription {
  @Prop({ required: true, unique: true })
  appointmentId!: number;

  @Prop({ required: true })
  patientName!: string;

  @Prop({ required: true })
  medication!: string;

  @Prop({ required: true })
  dosage!: string;

  @Prop()
  doctorNotes?: string;
}

export const PrescriptionSchema = SchemaFactory.createForClass(Prescription);
