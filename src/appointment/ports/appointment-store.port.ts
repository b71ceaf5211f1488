/**
 * Output port: persistence contract for appointments. Each write touches a
 * single record; no multi-record transactions are required.
 */
export interface AppointmentStorePort {
  findById(id: string): Promise<AppointmentData | null>;
  findMany(
    query: AppointmentQuery,
    order: SortDirection,
  ): Promise<AppointmentData[]>;
  insert(input: NewAppointment): Promise<AppointmentData>;
  updateById(
    id: string,
    changes: AppointmentChanges,
  ): Promise<AppointmentData | null>;
}

export interface AppointmentData {
  id: string;
  patientId: string;
  patientName: string;
  startTime: Date;
  endTime: Date;
  service: string;
  status: string;
}

export type NewAppointment = Omit<AppointmentData, 'id'>;

export type AppointmentChanges = Partial<
  Pick<AppointmentData, 'startTime' | 'endTime' | 'service' | 'status'>
>;

/** Absent keys do not constrain the result. Date bounds are inclusive. */
export interface AppointmentQuery {
  patientId?: string;
  status?: string;
  startFrom?: Date;
  startTo?: Date;
}

export type SortDirection = 'ASC' | 'DESC';

export const APPOINTMENT_STORE = Symbol('APPOINTMENT_STORE');
