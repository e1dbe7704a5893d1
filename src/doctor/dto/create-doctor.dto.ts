import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { ArrayUnique, IsArray, IsEmail, IsNotEmpty, IsString, Matches, MinLength } from 'class-validator';
import { normalizeEmail } from '../../common/dto/transforms';

export class CreateDoctorDto {
  @ApiProperty({ example: 'Dr. Smith', description: 'Full name of the doctor' })
  @IsString({ message: 'Name must be text' })
  @IsNotEmpty({ message: 'Name cannot be empty' })
  @MinLength(2, { message: 'Name must be at least 2 characters long' })
  name!: string;

  @ApiProperty({ example: 'doctor@example.com', description: 'Valid email address' })
  @Transform(normalizeEmail)
  @IsEmail({}, {
    message: 'Invalid email format. Email must contain @ and domain (e.g., .com, .org). Example: doctor@example.com'
  })
  @IsNotEmpty({ message: 'Email cannot be empty' })
  email!: string;

  @ApiProperty({ example: 'Test@123', description: 'Strong password with minimum requirements' })
  @IsString({ message: 'Password must be text' })
  @IsNotEmpty({ message: 'Password cannot be empty' })
  @MinLength(8, { message: 'Password must be at least 8 characters long' })
  @Matches(/^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[@$!%*?&])[A-Za-z\d@$!%*?&]{8,}$/, {
    message: 'Password must contain at least one uppercase letter, one lowercase letter, one number and one special character (@$!%*?&)'
  })
  password!: string;

  @ApiProperty({ example: '9876543210', description: '10-digit phone number' })
  @IsString({ message: 'Phone number must be text' })
  @Matches(/^\d{10}$/, { message: 'Phone number must be exactly 10 digits' })
  phone!: string;

  @ApiProperty({ example: 'Cardiology' })
  @IsString({ message: 'Specialty must be text' })
  @IsNotEmpty({ message: 'Specialty cannot be empty' })
  specialty!: string;

  @ApiProperty({ example: ['09:00', '10:00', '14:00'], description: 'Bookable HH:mm slots drawn from the clinic template' })
  @IsArray({ message: 'Available times must be a list' })
  @ArrayUnique({ message: 'Available times must not repeat' })
  @Matches(/^([01]\d|2[0-3]):[0-5]\d$/, { each: true, message: 'Available times must use HH:mm format' })
  availableTimes!: string[];
}
