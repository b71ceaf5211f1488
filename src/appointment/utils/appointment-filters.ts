import { Role } from '../../users/enums/role.enum';
import type { Caller } from '../../auth/types/caller.type';
import type {
  AppointmentChanges,
  AppointmentQuery,
} from '../ports/appointment-store.port';
import type {
  ListAppointmentsQueryDto,
  UpdateAppointmentDto,
} from '../dto/appointment.schemas';
import {
  endOfDayBound,
  parseCalendarDate,
  parseTimestampOrOmit,
} from './timestamp.utils';
import { isUuid } from '../../common/utils/uuid.utils';

/**
 * Builds the store query for a listing. Clients are always pinned to their
 * own patient id, whatever they sent; practitioners may narrow by patient.
 * Dates and patient ids that do not parse are ignored.
 */
export function buildAppointmentQuery(
  caller: Caller,
  filters: ListAppointmentsQueryDto,
): AppointmentQuery {
  const query: AppointmentQuery = {};

  if (filters.startDate) {
    const start = parseCalendarDate(filters.startDate);
    if (start) {
      query.startFrom = start;
    }
  }

  if (filters.endDate) {
    const end = parseCalendarDate(filters.endDate);
    if (end) {
      query.startTo = endOfDayBound(end);
    }
  }

  if (filters.status) {
    query.status = filters.status;
  }

  if (caller.role === Role.CLIENT) {
    query.patientId = caller.userId;
  } else if (filters.patientId && isUuid(filters.patientId)) {
    query.patientId = filters.patientId;
  }

  return query;
}

/** Keeps only the supplied, well-formed fields of a sparse update. */
export function buildAppointmentChanges(
  input: UpdateAppointmentDto,
): AppointmentChanges {
  const changes: AppointmentChanges = {};

  const startTime = parseTimestampOrOmit(input.startTime);
  if (startTime) {
    changes.startTime = startTime;
  }

  const endTime = parseTimestampOrOmit(input.endTime);
  if (endTime) {
    changes.endTime = endTime;
  }

  if (input.service !== undefined) {
    changes.service = input.service;
  }

  if (input.status !== undefined) {
    changes.status = input.status;
  }

  return changes;
}
