import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class CreatePrescriptionDto {
  @ApiProperty({ example: 1 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  appointmentId!: number;

  @ApiProperty({ example: 'John Doe' })
  @IsString()
  @IsNotEmpty({ message: 'Patient name cannot be empty' })
  patientName!: string;

  @ApiProperty({ example: 'Amoxicillin' })
  @IsString()
  @IsNotEmpty({ message: 'Medication cannot be empty' })
  medication!: string;

  @ApiProperty({ example: '500mg twice a day' })
  @IsString()
  @IsNotEmpty({ message: 'Dosage cannot be empty' })
  dosage!: string;

  @ApiPropertyOptional({ example: 'Take after meals' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  doctorNotes?: string;
}
