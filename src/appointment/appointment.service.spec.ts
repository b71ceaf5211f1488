import {
  BadRequestException,
  ForbiddenException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { AppointmentService } from './appointment.service';
import { NotificationService } from '../notification/notification.service';
import { Role } from '../users/enums/role.enum';
import type { Caller } from '../auth/types/caller.type';
import type { AppointmentData } from './ports/appointment-store.port';
import { InMemoryAppointmentStore } from '../../test/fakes/in-memory-appointment.store';
import { InMemoryUserDirectory } from '../../test/fakes/in-memory-user.directory';
import { RecordingSmsProvider } from '../../test/fakes/recording-sms.provider';

const BEN_ID = '3b2f6c1e-8d4a-4f7b-9c2e-5a1d7e9f0b13';

const client: Caller = { userId: 'client-1', role: Role.CLIENT };
const otherClient: Caller = { userId: BEN_ID, role: Role.CLIENT };
const dentist: Caller = { userId: 'dentist-1', role: Role.DENTIST };
const staff: Caller = { userId: 'staff-1', role: Role.STAFF };

const julyFirst: AppointmentData = {
  id: 'apt-1',
  patientId: 'client-1',
  patientName: 'Ana Client',
  startTime: new Date('2024-07-01T08:00:00Z'),
  endTime: new Date('2024-07-01T08:30:00Z'),
  service: 'Check-up',
  status: 'Scheduled',
};

const julyMid: AppointmentData = {
  id: 'apt-2',
  patientId: BEN_ID,
  patientName: 'Ben Client',
  startTime: new Date('2024-07-15T10:00:00Z'),
  endTime: new Date('2024-07-15T11:00:00Z'),
  service: 'Filling',
  status: 'Cancelled',
};

const julyLast: AppointmentData = {
  id: 'apt-3',
  patientId: 'client-1',
  patientName: 'Ana Client',
  startTime: new Date('2024-07-31T23:00:00Z'),
  endTime: new Date('2024-07-31T23:30:00Z'),
  service: 'Cleaning',
  status: 'Scheduled',
};

describe('AppointmentService', () => {
  let store: InMemoryAppointmentStore;
  let users: InMemoryUserDirectory;
  let sms: RecordingSmsProvider;
  let notifications: NotificationService;
  let service: AppointmentService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    store = new InMemoryAppointmentStore();
    users = new InMemoryUserDirectory();
    sms = new RecordingSmsProvider();
    notifications = new NotificationService(sms);
    service = new AppointmentService(store, users, notifications);

    users.seed({ id: 'client-1', fullName: 'Ana Client', phone: '+15550001111' });
    users.seed({ id: BEN_ID, fullName: 'Ben Client', phone: null });
    users.seed({ id: 'dentist-1', fullName: 'Dr. Cole', role: Role.DENTIST });
    users.seed({ id: 'staff-1', fullName: 'Dana Desk', role: Role.STAFF });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('create', () => {
    const booking = {
      startTime: '2024-07-01T08:00:00Z',
      endTime: '2024-07-01T08:30:00Z',
      service: 'Cleaning',
    };

    it('books for the caller with a name snapshot and Scheduled status', async () => {
      const created = await service.create(client, booking);

      expect(created).toEqual({
        id: expect.any(String),
        patientId: 'client-1',
        patientName: 'Ana Client',
        startTime: new Date('2024-07-01T08:00:00Z'),
        endTime: new Date('2024-07-01T08:30:00Z'),
        service: 'Cleaning',
        status: 'Scheduled',
      });
      expect(await store.findById(created.id)).toEqual(created);
    });

    it('sends a confirmation SMS without waiting for it', async () => {
      await service.create(client, booking);
      await notifications.drain();

      expect(sms.sent).toEqual([
        {
          phone: '+15550001111',
          message: 'Appointment Confirmed: Cleaning for Ana Client on Jul 1 at 8:00 AM.',
        },
      ]);
    });

    it('still succeeds when the SMS provider fails', async () => {
      sms.failWith = new Error('quota exceeded');

      const created = await service.create(client, booking);
      await notifications.drain();

      expect(created.status).toBe('Scheduled');
      expect(sms.sent).toEqual([]);
      expect(Logger.prototype.error).toHaveBeenCalledWith(
        '❌ Failed to send SMS to ***1111: quota exceeded',
      );
    });

    it('skips the SMS for patients without a phone', async () => {
      await service.create(otherClient, booking);
      await notifications.drain();

      expect(sms.sent).toEqual([]);
      expect(store.size).toBe(1);
    });

    it.each([dentist, staff])('refuses $role callers', async (caller) => {
      await expect(service.create(caller, booking)).rejects.toThrow(
        ForbiddenException,
      );
      expect(store.size).toBe(0);
    });

    it('rejects timestamps that are not RFC 3339', async () => {
      await expect(
        service.create(client, { ...booking, startTime: '07/01/2024 8am' }),
      ).rejects.toThrow(new BadRequestException('Invalid time format, use RFC3339'));
      expect(store.size).toBe(0);
    });

    it('rejects a start time on a day the month does not have', async () => {
      await expect(
        service.create(client, { ...booking, startTime: '2024-02-30T10:00:00Z' }),
      ).rejects.toThrow(new BadRequestException('Invalid time format, use RFC3339'));
      expect(store.size).toBe(0);
    });

    it('fails with NotFound when the caller has no user record', async () => {
      await expect(
        service.create({ userId: 'ghost', role: Role.CLIENT }, booking),
      ).rejects.toThrow(NotFoundException);
      expect(store.size).toBe(0);
    });
  });

  describe('list', () => {
    beforeEach(() => {
      store.seed(julyLast);
      store.seed(julyFirst);
      store.seed(julyMid);
    });

    it('scopes clients to their own appointments, whatever filter they send', async () => {
      const result = await service.list(
        client,
        { patientId: BEN_ID },
        'chronological',
      );

      expect(ids(result)).toEqual(['apt-1', 'apt-3']);
      expect(result.every((a) => a.patientId === 'client-1')).toBe(true);
    });

    it('shows practitioners everything, in the requested order', async () => {
      expect(ids(await service.list(dentist, {}, 'chronological'))).toEqual([
        'apt-1',
        'apt-2',
        'apt-3',
      ]);
      expect(ids(await service.list(staff, {}, 'newest-first'))).toEqual([
        'apt-3',
        'apt-2',
        'apt-1',
      ]);
    });

    it('lets practitioners narrow by patient', async () => {
      expect(
        ids(await service.list(dentist, { patientId: BEN_ID }, 'chronological')),
      ).toEqual(['apt-2']);
    });

    it('includes both ends of the date range', async () => {
      const result = await service.list(
        dentist,
        { startDate: '2024-07-01', endDate: '2024-07-31' },
        'chronological',
      );

      expect(ids(result)).toEqual(['apt-1', 'apt-2', 'apt-3']);
    });

    it('excludes appointments before the start date', async () => {
      const result = await service.list(
        dentist,
        { startDate: '2024-07-02' },
        'chronological',
      );

      expect(ids(result)).toEqual(['apt-2', 'apt-3']);
    });

    it('ignores a patient filter that is not a uuid', async () => {
      expect(
        ids(await service.list(dentist, { patientId: 'abc' }, 'chronological')),
      ).toEqual(['apt-1', 'apt-2', 'apt-3']);
    });

    it('filters by status', async () => {
      expect(
        ids(await service.list(dentist, { status: 'Cancelled' }, 'chronological')),
      ).toEqual(['apt-2']);
    });

    it('returns an empty array when nothing matches', async () => {
      await expect(
        service.list(dentist, { status: 'NoShow' }, 'newest-first'),
      ).resolves.toEqual([]);
    });
  });

  describe('get', () => {
    beforeEach(() => {
      store.seed(julyFirst);
      store.seed(julyMid);
    });

    it('returns a client their own appointment', async () => {
      await expect(service.get(client, 'apt-1')).resolves.toEqual(julyFirst);
    });

    it("hides other patients' appointments from clients", async () => {
      await expect(service.get(client, 'apt-2')).rejects.toThrow(
        new NotFoundException('Appointment not found'),
      );
    });

    it('returns any appointment to practitioners', async () => {
      await expect(service.get(staff, 'apt-2')).resolves.toEqual(julyMid);
    });
  });

  describe('update', () => {
    beforeEach(() => {
      store.seed(julyFirst);
    });

    it('rejects an update with no fields', async () => {
      await expect(service.update(dentist, 'apt-1', {})).rejects.toThrow(
        new BadRequestException('No fields to update'),
      );
    });

    it('rejects an update whose only fields were malformed', async () => {
      await expect(
        service.update(dentist, 'apt-1', { startTime: 'tomorrow' }),
      ).rejects.toThrow(BadRequestException);
      expect(await store.findById('apt-1')).toEqual(julyFirst);
    });

    it('changes only the supplied fields', async () => {
      const updated = await service.update(staff, 'apt-1', {
        service: 'Whitening',
      });

      expect(updated).toEqual({ ...julyFirst, service: 'Whitening' });
    });

    it('drops a malformed timestamp and applies the rest', async () => {
      const updated = await service.update(dentist, 'apt-1', {
        startTime: 'not-a-time',
        endTime: '2024-07-01T09:00:00Z',
        status: 'Completed',
      });

      expect(updated).toEqual({
        ...julyFirst,
        endTime: new Date('2024-07-01T09:00:00Z'),
        status: 'Completed',
      });
    });

    it('refuses clients', async () => {
      await expect(
        service.update(client, 'apt-1', { status: 'Completed' }),
      ).rejects.toThrow(ForbiddenException);
      expect((await store.findById('apt-1'))?.status).toBe('Scheduled');
    });

    it('fails with NotFound for an unknown id', async () => {
      await expect(
        service.update(dentist, 'missing', { service: 'X-ray' }),
      ).rejects.toThrow(NotFoundException);
    });
  });

  describe('cancel', () => {
    beforeEach(() => {
      store.seed(julyFirst);
    });

    it('marks the appointment cancelled and keeps the record', async () => {
      const cancelled = await service.cancel(staff, 'apt-1');

      expect(cancelled).toEqual({ ...julyFirst, status: 'Cancelled' });
      expect(ids(await service.list(dentist, {}, 'chronological'))).toEqual([
        'apt-1',
      ]);
      expect((await service.get(client, 'apt-1')).status).toBe('Cancelled');
    });

    it('tells the patient by SMS', async () => {
      await service.cancel(dentist, 'apt-1');
      await notifications.drain();

      expect(sms.sent).toEqual([
        {
          phone: '+15550001111',
          message: 'Appointment Cancelled: Check-up for Ana Client on Jul 1 at 8:00 AM.',
        },
      ]);
    });

    it('still cancels when the patient can no longer be found', async () => {
      store.seed({ ...julyMid, id: 'apt-orphan', patientId: 'ghost' });

      const cancelled = await service.cancel(dentist, 'apt-orphan');
      await notifications.drain();

      expect(cancelled.status).toBe('Cancelled');
      expect(sms.sent).toEqual([]);
    });

    it('still cancels when the patient lookup fails after the write', async () => {
      jest
        .spyOn(users, 'findById')
        .mockRejectedValue(new Error('connection reset'));

      const cancelled = await service.cancel(staff, 'apt-1');
      await notifications.drain();

      expect(cancelled).toEqual({ ...julyFirst, status: 'Cancelled' });
      expect((await store.findById('apt-1'))?.status).toBe('Cancelled');
      expect(sms.sent).toEqual([]);
      expect(Logger.prototype.error).toHaveBeenCalledWith(
        '❌ Patient lookup failed for client-1; cancellation SMS skipped: connection reset',
      );
    });

    it('fails with NotFound for an unknown id', async () => {
      await expect(service.cancel(staff, 'missing')).rejects.toThrow(
        new NotFoundException('Appointment not found'),
      );
    });

    it('refuses clients without touching the record', async () => {
      await expect(service.cancel(client, 'apt-1')).rejects.toThrow(
        ForbiddenException,
      );
      expect((await store.findById('apt-1'))?.status).toBe('Scheduled');
    });
  });
});

function ids(appointments: AppointmentData[]): string[] {
  return appointments.map((a) => a.id);
}
