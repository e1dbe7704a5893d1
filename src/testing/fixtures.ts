import { Appointment, AppointmentStatus } from '../entities/appointment.entity';
import { Doctor } from '../entities/doctor.entity';
import { Patient } from '../entities/patient.entity';

export function buildDoctor(overrides: Partial<Doctor> = {}): Doctor {
  return Object.assign(new Doctor(), {
    id: 1,
    name: 'Dr. Adam Smith',
    email: 'adam.smith@example.com',
    password: 'hashed',
    phone: '5550001111',
    specialty: 'Cardiology',
    availableTimes: ['08:00', '09:00', '14:00'],
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  });
}

export function buildPatient(overrides: Partial<Patient> = {}): Patient {
  return Object.assign(new Patient(), {
    id: 1,
    name: 'Jane Doe',
    email: 'jane.doe@example.com',
    password: 'hashed',
    phone: '5550002222',
    address: '12 Main Street',
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  });
}

export function buildAppointment(overrides: Partial<Appointment> = {}): Appointment {
  return Object.assign(new Appointment(), {
    id: 1,
    doctor: buildDoctor(),
    patient: buildPatient(),
    appointmentTime: new Date('2024-01-10T09:00:00Z'),
    durationMinutes: 60,
    status: AppointmentStatus.SCHEDULED,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  });
}
