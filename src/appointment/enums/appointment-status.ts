/**
 * Known status tags. The column is an open string so new tags can be
 * introduced by practitioners without a schema change.
 */
export const AppointmentStatus = {
  SCHEDULED: 'Scheduled',
  CANCELLED: 'Cancelled',
} as const;
