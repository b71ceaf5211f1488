import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { lastValueFrom, timeout } from 'rxjs';
import type { SmsProviderPort } from '../ports/sms-provider.port';
import type {
  SmsDeliveryReceipt,
  TextbeltSendResponse,
} from '../types/textbelt-response.type';

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Adapter: sends SMS through the Textbelt HTTP API using HttpService (Axios).
 */
@Injectable()
export class TextbeltSmsAdapter implements SmsProviderPort {
  private readonly logger = new Logger(TextbeltSmsAdapter.name);
  private readonly apiUrl = 'https://textbelt.com/text';
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.timeoutMs =
      this.configService.get<number>('SMS_TIMEOUT_MS') ?? DEFAULT_TIMEOUT_MS;
  }

  async sendSms(phone: string, message: string): Promise<SmsDeliveryReceipt> {
    const key = this.configService.get<string>('TEXTBELT_API_KEY');

    if (!key) {
      throw new Error('TEXTBELT_API_KEY is not configured');
    }

    const response = await lastValueFrom(
      this.httpService
        .post<TextbeltSendResponse>(this.apiUrl, { phone, message, key })
        .pipe(timeout(this.timeoutMs)),
    );

    const body = response.data;

    if (!body.success) {
      throw new Error(body.error ?? 'Textbelt rejected the message');
    }

    this.logger.debug(
      `Textbelt accepted message ${body.textId ?? '?'} (quota left: ${body.quotaRemaining ?? '?'})`,
    );

    return { messageId: body.textId, quotaRemaining: body.quotaRemaining };
  }
}
