import { addMinutes, calendarDate, timeOfDay } from '../common/scheduling';
import { Appointment, AppointmentStatus } from '../entities/appointment.entity';

export interface AppointmentView {
  id: number;
  doctorId: number;
  doctorName: string;
  patientId: number;
  patientName: string;
  patientEmail: string;
  patientPhone: string;
  patientAddress: string;
  appointmentTime: string;
  appointmentDate: string;
  appointmentTimeOnly: string;
  endTime: string;
  durationMinutes: number;
  status: AppointmentStatus;
}

/** Flattens an appointment loaded with its doctor and patient relations. */
export function toAppointmentView(appointment: Appointment): AppointmentView {
  const { doctor, patient, appointmentTime } = appointment;
  return {
    id: appointment.id,
    doctorId: doctor.id,
    doctorName: doctor.name,
    patientId: patient.id,
    patientName: patient.name,
    patientEmail: patient.email,
    patientPhone: patient.phone,
    patientAddress: patient.address,
    appointmentTime: appointmentTime.toISOString(),
    appointmentDate: calendarDate(appointmentTime),
    appointmentTimeOnly: timeOfDay(appointmentTime),
    endTime: addMinutes(appointmentTime, appointment.durationMinutes).toISOString(),
    durationMinutes: appointment.durationMinutes,
    status: appointment.status,
  };
}
