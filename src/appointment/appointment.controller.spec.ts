import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { AccessGateway } from '../auth/access-gateway.service';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { Role } from '../auth/role.enum';
import { HttpExceptionFilter } from '../common/filters/http-exception.filter';
import { fail, ok } from '../common/result';
import { Appointment } from '../entities/appointment.entity';
import { Doctor } from '../entities/doctor.entity';
import { buildAppointment, buildDoctor, buildPatient } from '../testing/fixtures';
import { AppointmentValidatorService } from './appointment-validator.service';
import { AppointmentController } from './appointment.controller';
import { AppointmentService } from './appointment.service';

describe('AppointmentController (HTTP)', () => {
  const patientAccount = { role: Role.PATIENT, accountId: 2, identity: 'patient@example.com' };
  const accessGateway = { authorize: jest.fn() };
  const doctorRepository = { findOne: jest.fn() };
  const appointmentRepository = {
    create: jest.fn((appointment: Partial<Appointment>) => appointment),
    save: jest.fn(),
    find: jest.fn(),
  };
  const transactionalAppointments = { findOne: jest.fn(), delete: jest.fn() };
  const manager = { getRepository: jest.fn(() => transactionalAppointments) };
  const dataSource = { transaction: jest.fn((work: (entityManager: typeof manager) => Promise<unknown>) => work(manager)) };
  let app: INestApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [AppointmentController],
      providers: [
        AppointmentService,
        AppointmentValidatorService,
        JwtAuthGuard,
        { provide: AccessGateway, useValue: accessGateway },
        { provide: getRepositoryToken(Doctor), useValue: doctorRepository },
        { provide: getRepositoryToken(Appointment), useValue: appointmentRepository },
        { provide: DataSource, useValue: dataSource },
      ],
    }).compile();

    app = moduleRef.createNestApplication({ logger: false });
    app.setGlobalPrefix('api');
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    app.useGlobalFilters(new HttpExceptionFilter());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    jest.clearAllMocks();
    accessGateway.authorize.mockResolvedValue(ok(patientAccount));
  });

  describe('POST /api/appointments', () => {
    it('books an offered slot', async () => {
      doctorRepository.findOne.mockResolvedValue(buildDoctor({ id: 1, availableTimes: ['09:00'] }));
      appointmentRepository.save.mockImplementation(async (appointment: Partial<Appointment>) => ({ ...appointment, id: 21 }));

      const response = await request(app.getHttpServer())
        .post('/api/appointments')
        .set('Authorization', 'Bearer test-token')
        .send({ doctorId: 1, appointmentTime: '2024-01-10T09:00:00Z' })
        .expect(201);

      expect(response.body).toEqual({
        message: 'Appointment booked successfully.',
        data: {
          id: 21,
          doctorId: 1,
          patientId: 2,
          appointmentTime: '2024-01-10T09:00:00.000Z',
          durationMinutes: 60,
          status: 0,
        },
      });
      expect(accessGateway.authorize).toHaveBeenCalledWith('test-token', [Role.PATIENT]);
    });

    it('rejects an unknown doctor with 400', async () => {
      doctorRepository.findOne.mockResolvedValue(null);

      const response = await request(app.getHttpServer())
        .post('/api/appointments')
        .set('Authorization', 'Bearer test-token')
        .send({ doctorId: 99, appointmentTime: '2024-01-10T09:00:00Z' })
        .expect(400);

      expect(response.body).toEqual({ message: 'Invalid doctor ID.' });
      expect(appointmentRepository.save).not.toHaveBeenCalled();
    });

    it('rejects a slot the doctor does not offer with 409', async () => {
      doctorRepository.findOne.mockResolvedValue(buildDoctor({ id: 1, availableTimes: ['08:00'] }));

      const response = await request(app.getHttpServer())
        .post('/api/appointments')
        .set('Authorization', 'Bearer test-token')
        .send({ doctorId: 1, appointmentTime: '2024-01-10T09:00:00Z' })
        .expect(409);

      expect(response.body).toEqual({ message: 'Requested time slot is not available.' });
    });

    it('refuses an instant that is not on the slot minute', async () => {
      doctorRepository.findOne.mockResolvedValue(buildDoctor({ id: 1, availableTimes: ['09:00'] }));

      const response = await request(app.getHttpServer())
        .post('/api/appointments')
        .set('Authorization', 'Bearer test-token')
        .send({ doctorId: 1, appointmentTime: '2024-01-10T09:00:30.500Z' })
        .expect(409);

      expect(response.body).toEqual({ message: 'Requested time slot is not available.' });
      expect(appointmentRepository.save).not.toHaveBeenCalled();
    });

    it('answers 500 when the store fails', async () => {
      doctorRepository.findOne.mockResolvedValue(buildDoctor({ id: 1, availableTimes: ['09:00'] }));
      appointmentRepository.save.mockRejectedValue(new Error('connection reset'));

      const response = await request(app.getHttpServer())
        .post('/api/appointments')
        .set('Authorization', 'Bearer test-token')
        .send({ doctorId: 1, appointmentTime: '2024-01-10T09:00:00Z' })
        .expect(500);

      expect(response.body).toEqual({ message: 'Failed to book appointment.' });
    });

    it('joins validation messages', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/appointments')
        .set('Authorization', 'Bearer test-token')
        .send({ doctorId: 0, appointmentTime: 'tomorrow' })
        .expect(400);

      expect(response.body).toEqual({
        message: 'doctorId must not be less than 1, appointmentTime must be an ISO 8601 date-time',
      });
    });

    it('requires a bearer token', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/appointments')
        .send({ doctorId: 1, appointmentTime: '2024-01-10T09:00:00Z' })
        .expect(401);

      expect(response.body).toEqual({ message: 'No authentication token provided' });
      expect(accessGateway.authorize).not.toHaveBeenCalled();
    });

    it('rejects a token without a patient account', async () => {
      accessGateway.authorize.mockResolvedValue(
        fail('AuthFailure', 'AccountNotFound', 'Invalid patient token: user not found')
      );

      const response = await request(app.getHttpServer())
        .post('/api/appointments')
        .set('Authorization', 'Bearer test-token')
        .send({ doctorId: 1, appointmentTime: '2024-01-10T09:00:00Z' })
        .expect(401);

      expect(response.body).toEqual({ message: 'Invalid patient token: user not found' });
    });
  });

  describe('DELETE /api/appointments/:id', () => {
    it("refuses to cancel another patient's appointment", async () => {
      transactionalAppointments.findOne.mockResolvedValue(buildAppointment({ id: 5, patient: buildPatient({ id: 7 }) }));

      const response = await request(app.getHttpServer())
        .delete('/api/appointments/5')
        .set('Authorization', 'Bearer test-token')
        .expect(401);

      expect(response.body).toEqual({ message: 'Unauthorized: Patient ID mismatch.' });
      expect(transactionalAppointments.delete).not.toHaveBeenCalled();
    });

    it('cancels an own appointment', async () => {
      transactionalAppointments.findOne.mockResolvedValue(buildAppointment({ id: 5, patient: buildPatient({ id: 2 }) }));

      const response = await request(app.getHttpServer())
        .delete('/api/appointments/5')
        .set('Authorization', 'Bearer test-token')
        .expect(200);

      expect(response.body).toEqual({ message: 'Appointment cancelled successfully.' });
      expect(transactionalAppointments.delete).toHaveBeenCalledWith({ id: 5 });
    });
  });

  describe('GET /api/appointments', () => {
    it("lists the calling doctor's day", async () => {
      accessGateway.authorize.mockResolvedValue(ok({ role: Role.DOCTOR, accountId: 1, identity: 'doctor@example.com' }));
      appointmentRepository.find.mockResolvedValue([
        buildAppointment({ id: 5, doctor: buildDoctor({ id: 1 }), appointmentTime: new Date('2024-01-10T09:00:00Z') }),
      ]);

      const response = await request(app.getHttpServer())
        .get('/api/appointments?date=2024-01-10')
        .set('Authorization', 'Bearer test-token')
        .expect(200);

      expect(response.body.data).toEqual([
        {
          id: 5,
          doctorId: 1,
          doctorName: 'Dr. Adam Smith',
          patientId: 1,
          patientName: 'Jane Doe',
          patientEmail: 'jane.doe@example.com',
          patientPhone: '5550002222',
          patientAddress: '12 Main Street',
          appointmentTime: '2024-01-10T09:00:00.000Z',
          appointmentDate: '2024-01-10',
          appointmentTimeOnly: '09:00',
          endTime: '2024-01-10T10:00:00.000Z',
          durationMinutes: 60,
          status: 0,
        },
      ]);
    });

    it('rejects a date that does not exist', async () => {
      accessGateway.authorize.mockResolvedValue(ok({ role: Role.DOCTOR, accountId: 1, identity: 'doctor@example.com' }));

      const response = await request(app.getHttpServer())
        .get('/api/appointments?date=2024-02-30')
        .set('Authorization', 'Bearer test-token')
        .expect(400);

      expect(response.body).toEqual({ message: 'Invalid date format. Use YYYY-MM-DD' });
    });
  });
});
