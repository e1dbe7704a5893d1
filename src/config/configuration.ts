import { registerAs } from '@nestjs/config';

export const DEFAULT_SLOT_TEMPLATE = ['08:00', '09:00', '10:00', '11:00', '13:00', '14:00', '15:00', '16:00'];

export const appConfig = registerAs('app', () => ({
  port: parseInt(process.env.PORT || '3000', 10),
}));

export const databaseConfig = registerAs('database', () => ({
  url: process.env.DATABASE_URL || '',
  synchronize: process.env.DATABASE_SYNCHRONIZE === 'true',
}));

export const mongoConfig = registerAs('mongo', () => ({
  uri: process.env.MONGODB_URI || '',
}));

export const TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;

export const jwtConfig = registerAs('jwt', () => ({
  secret: process.env.JWT_SECRET || '',
  expiresInSeconds: TOKEN_TTL_SECONDS,
}));

export const adminConfig = registerAs('admin', () => ({
  username: process.env.ADMIN_USERNAME,
  password: process.env.ADMIN_PASSWORD,
}));

export const schedulingConfig = registerAs('scheduling', () => ({
  slotTemplate: process.env.SLOT_TEMPLATE
    ? process.env.SLOT_TEMPLATE.split(',').map((slot) => slot.trim()).filter((slot) => slot.length > 0)
    : DEFAULT_SLOT_TEMPLATE,
}));

export const configurations = [appConfig, databaseConfig, mongoConfig, jwtConfig, adminConfig, schedulingConfig];
