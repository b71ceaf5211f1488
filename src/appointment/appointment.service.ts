import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { assertAuthorized, Operation } from '../access/access-policy';
import { Role } from '../users/enums/role.enum';
import type { Caller } from '../auth/types/caller.type';
import { USER_DIRECTORY } from '../users/ports/user-directory.port';
import type {
  UserDirectoryPort,
  UserRecord,
} from '../users/ports/user-directory.port';
import { APPOINTMENT_STORE } from './ports/appointment-store.port';
import type {
  AppointmentData,
  AppointmentStorePort,
  SortDirection,
} from './ports/appointment-store.port';
import { NotificationService } from '../notification/notification.service';
import { AppointmentStatus } from './enums/appointment-status';
import { extractErrorMessage } from '../common/utils/error.utils';
import { parseRfc3339 } from './utils/timestamp.utils';
import {
  buildAppointmentChanges,
  buildAppointmentQuery,
} from './utils/appointment-filters';
import type {
  CreateAppointmentDto,
  ListAppointmentsQueryDto,
  UpdateAppointmentDto,
} from './dto/appointment.schemas';

/**
 * `chronological` groups the agenda by day (oldest first);
 * `newest-first` is the history view.
 */
export type ListMode = 'chronological' | 'newest-first';

const SORT_BY_MODE: Record<ListMode, SortDirection> = {
  chronological: 'ASC',
  'newest-first': 'DESC',
};

/**
 * Appointment lifecycle: booking, listing, rescheduling and cancellation.
 *
 * Every operation checks the caller's role before touching the store.
 * Notifications are handed to NotificationService and never awaited.
 */
@Injectable()
export class AppointmentService {
  private readonly logger = new Logger(AppointmentService.name);

  constructor(
    @Inject(APPOINTMENT_STORE)
    private readonly appointmentStore: AppointmentStorePort,
    @Inject(USER_DIRECTORY)
    private readonly userDirectory: UserDirectoryPort,
    private readonly notificationService: NotificationService,
  ) {}

  /**
   * Books an appointment for the calling client. The patient is always the
   * caller; the stored patient name is a snapshot taken now.
   */
  async create(
    caller: Caller,
    input: CreateAppointmentDto,
  ): Promise<AppointmentData> {
    assertAuthorized(caller, Operation.BOOK_APPOINTMENT);

    const startTime = parseRfc3339(input.startTime);
    const endTime = parseRfc3339(input.endTime);

    if (!startTime || !endTime) {
      throw new BadRequestException('Invalid time format, use RFC3339');
    }

    const patient = await this.userDirectory.findById(caller.userId);

    if (!patient) {
      throw new NotFoundException('Could not find user details');
    }

    const appointment = await this.appointmentStore.insert({
      patientId: patient.id,
      patientName: patient.fullName,
      startTime,
      endTime,
      service: input.service,
      status: AppointmentStatus.SCHEDULED,
    });

    this.logger.log(`🆕 Appointment ${appointment.id} booked by ${patient.id}`);
    this.notificationService.notifyAppointmentConfirmed(patient, appointment);

    return appointment;
  }

  async list(
    caller: Caller,
    filters: ListAppointmentsQueryDto,
    mode: ListMode,
  ): Promise<AppointmentData[]> {
    assertAuthorized(caller, Operation.LIST_APPOINTMENTS);

    return this.appointmentStore.findMany(
      buildAppointmentQuery(caller, filters),
      SORT_BY_MODE[mode],
    );
  }

  /**
   * Clients only see their own appointments; anyone else's id looks the
   * same as a missing one.
   */
  async get(caller: Caller, id: string): Promise<AppointmentData> {
    assertAuthorized(caller, Operation.VIEW_APPOINTMENT);

    const appointment = await this.appointmentStore.findById(id);

    if (
      !appointment ||
      (caller.role === Role.CLIENT && appointment.patientId !== caller.userId)
    ) {
      throw new NotFoundException('Appointment not found');
    }

    return appointment;
  }

  async update(
    caller: Caller,
    id: string,
    input: UpdateAppointmentDto,
  ): Promise<AppointmentData> {
    assertAuthorized(caller, Operation.MODIFY_APPOINTMENT);

    const changes = buildAppointmentChanges(input);

    if (Object.keys(changes).length === 0) {
      throw new BadRequestException('No fields to update');
    }

    const updated = await this.appointmentStore.updateById(id, changes);

    if (!updated) {
      throw new NotFoundException('Appointment not found');
    }

    this.logger.log(
      `Appointment ${id} updated by ${caller.userId}: ${Object.keys(changes).join(', ')}`,
    );
    return updated;
  }

  /**
   * Marks the appointment cancelled (the record is kept) and tells the
   * patient if they can still be found.
   */
  async cancel(caller: Caller, id: string): Promise<AppointmentData> {
    assertAuthorized(caller, Operation.CANCEL_APPOINTMENT);

    const existing = await this.appointmentStore.findById(id);

    if (!existing) {
      throw new NotFoundException('Appointment not found');
    }

    const cancelled = await this.appointmentStore.updateById(id, {
      status: AppointmentStatus.CANCELLED,
    });

    if (!cancelled) {
      throw new NotFoundException('Appointment not found');
    }

    this.logger.log(`🗓️ Appointment ${id} cancelled by ${caller.userId}`);
    await this.notifyCancellation(cancelled);

    return cancelled;
  }

  // The cancellation is already stored: a failed lookup only costs the SMS.
  private async notifyCancellation(cancelled: AppointmentData): Promise<void> {
    let patient: UserRecord | null;

    try {
      patient = await this.userDirectory.findById(cancelled.patientId);
    } catch (error: unknown) {
      this.logger.error(
        `❌ Patient lookup failed for ${cancelled.patientId}; cancellation SMS skipped: ${extractErrorMessage(error)}`,
      );
      return;
    }

    if (!patient) {
      this.logger.warn(
        `Patient ${cancelled.patientId} not found; cancellation SMS skipped`,
      );
      return;
    }

    this.notificationService.notifyAppointmentCancelled(patient, cancelled);
  }
}
