import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from '@nestjs/common';
import { SMS_PROVIDER } from './ports/sms-provider.port';
import type { SmsProviderPort } from './ports/sms-provider.port';
import {
  buildCancellationMessage,
  buildConfirmationMessage,
  maskPhone,
} from './utils/notification.utils';
import type {
  NotifiableAppointment,
  NotifiablePatient,
} from './utils/notification.utils';
import { extractErrorMessage } from '../common/utils/error.utils';

/**
 * Fire-and-forget SMS dispatch.
 *
 * `dispatch` returns as soon as delivery has started. The outcome is only
 * ever logged: nothing is retried and nothing reaches the caller. In-flight
 * deliveries are tracked so shutdown (and tests) can wait for them.
 */
@Injectable()
export class NotificationService implements OnModuleDestroy {
  private readonly logger = new Logger(NotificationService.name);
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    @Inject(SMS_PROVIDER)
    private readonly smsProvider: SmsProviderPort,
  ) {}

  notifyAppointmentConfirmed(
    patient: NotifiablePatient,
    appointment: NotifiableAppointment,
  ): void {
    this.notifyPatient(
      patient,
      buildConfirmationMessage(patient, appointment),
    );
  }

  notifyAppointmentCancelled(
    patient: NotifiablePatient,
    appointment: NotifiableAppointment,
  ): void {
    this.notifyPatient(
      patient,
      buildCancellationMessage(patient, appointment),
    );
  }

  dispatch(phone: string, message: string): void {
    const delivery = this.deliver(phone, message).finally(() => {
      this.inFlight.delete(delivery);
    });

    this.inFlight.add(delivery);
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  /** Resolves once every delivery started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.log(
        `Waiting for ${this.inFlight.size} pending SMS deliveries`,
      );
      await this.drain();
    }
  }

  private notifyPatient(patient: NotifiablePatient, message: string): void {
    if (!patient.phone) {
      this.logger.warn(
        `SMS not sent: patient ${patient.fullName} has no phone number`,
      );
      return;
    }

    this.dispatch(patient.phone, message);
  }

  // Never rejects: this is the failure boundary for detached work.
  private async deliver(phone: string, message: string): Promise<void> {
    try {
      await this.smsProvider.sendSms(phone, message);
      this.logger.log(`✅ SMS sent to ${maskPhone(phone)}`);
    } catch (error: unknown) {
      this.logger.error(
        `❌ Failed to send SMS to ${maskPhone(phone)}: ${extractErrorMessage(error)}`,
      );
    }
  }
}
