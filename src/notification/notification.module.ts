import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { NotificationService } from './notification.service';
import { TextbeltSmsAdapter } from './adapters/textbelt-sms.adapter';
import { SMS_PROVIDER } from './ports/sms-provider.port';

@Module({
  imports: [ConfigModule, HttpModule],
  providers: [
    NotificationService,
    {
      provide: SMS_PROVIDER,
      useClass: TextbeltSmsAdapter,
    },
  ],
  exports: [NotificationService],
})
export class NotificationModule {}
