import { format } from 'date-fns';

export interface NotifiablePatient {
  fullName: string;
  phone: string | null;
}

export interface NotifiableAppointment {
  service: string;
  startTime: Date;
}

const START_TIME_FORMAT = "MMM d 'at' h:mm a";

export function formatStartTime(startTime: Date): string {
  return format(startTime, START_TIME_FORMAT);
}

export function buildConfirmationMessage(
  patient: NotifiablePatient,
  appointment: NotifiableAppointment,
): string {
  return `Appointment Confirmed: ${appointment.service} for ${patient.fullName} on ${formatStartTime(appointment.startTime)}.`;
}

export function buildCancellationMessage(
  patient: NotifiablePatient,
  appointment: NotifiableAppointment,
): string {
  return `Appointment Cancelled: ${appointment.service} for ${patient.fullName} on ${formatStartTime(appointment.startTime)}.`;
}

/** Last four digits only; full numbers stay out of the logs. */
export function maskPhone(phone: string): string {
  return phone.length <= 4 ? '****' : `***${phone.slice(-4)}`;
}
