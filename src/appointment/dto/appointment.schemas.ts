import { z } from 'zod';

export const createAppointmentSchema = z.object({
  startTime: z.string(),
  endTime: z.string(),
  service: z.string(),
});

// Timestamps stay raw strings here: malformed ones are dropped later, not rejected.
export const updateAppointmentSchema = z.object({
  startTime: z.string().optional(),
  endTime: z.string().optional(),
  service: z.string().optional(),
  status: z.string().optional(),
});

export const listAppointmentsQuerySchema = z.object({
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  status: z.string().optional(),
  patientId: z.string().optional(),
});

export type CreateAppointmentDto = z.infer<typeof createAppointmentSchema>;
export type UpdateAppointmentDto = z.infer<typeof updateAppointmentSchema>;
export type ListAppointmentsQueryDto = z.infer<
  typeof listAppointmentsQuerySchema
>;
