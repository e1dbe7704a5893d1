import { plainToInstance } from 'class-transformer';
import { IsBooleanString, IsNotEmpty, IsNumberString, IsOptional, IsString, Matches, validateSync } from 'class-validator';

class EnvironmentVariables {
  @IsOptional()
  @IsNumberString({}, { message: 'PORT must be a number' })
  PORT?: string;

  @IsString()
  @IsNotEmpty({ message: 'DATABASE_URL is required' })
  DATABASE_URL!: string;

  @IsOptional()
  @IsBooleanString({ message: 'DATABASE_SYNCHRONIZE must be true or false' })
  DATABASE_SYNCHRONIZE?: string;

  @IsString()
  @IsNotEmpty({ message: 'MONGODB_URI is required' })
  MONGODB_URI!: string;

  @IsString()
  @IsNotEmpty({ message: 'JWT_SECRET is required' })
  JWT_SECRET!: string;

  @IsOptional()
  @IsString()
  ADMIN_USERNAME?: string;

  @IsOptional()
  @IsString()
  ADMIN_PASSWORD?: string;

  @IsOptional()
  @Matches(/^([01]\d|2[0-3]):[0-5]\d(\s*,\s*([01]\d|2[0-3]):[0-5]\d)*$/, {
    message: 'SLOT_TEMPLATE must be a comma separated list of HH:mm values',
  })
  SLOT_TEMPLATE?: string;
}

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }
  return validated;
}
