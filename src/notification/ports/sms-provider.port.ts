import type { SmsDeliveryReceipt } from '../types/textbelt-response.type';

/**
 * Output port: sends one text message. Implementations reject when the
 * provider refuses the message; callers decide what a failure means.
 */
export interface SmsProviderPort {
  sendSms(phone: string, message: string): Promise<SmsDeliveryReceipt>;
}

export const SMS_PROVIDER = Symbol('SMS_PROVIDER');
