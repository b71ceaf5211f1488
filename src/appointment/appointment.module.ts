import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Appointment } from './entities/appointment.entity';
import { AppointmentService } from './appointment.service';
import { AppointmentAdapter } from './appointment.adapter';
import { AppointmentController } from './appointment.controller';
import { APPOINTMENT_STORE } from './ports/appointment-store.port';
import { SessionModule } from '../auth/session.module';
import { UsersModule } from '../users/users.module';
import { NotificationModule } from '../notification/notification.module';

/**
 * Ports -> adapters: the service only knows APPOINTMENT_STORE,
 * USER_DIRECTORY (from UsersModule) and NotificationService.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Appointment]),
    SessionModule,
    UsersModule,
    NotificationModule,
  ],
  controllers: [AppointmentController],
  providers: [
    AppointmentService,
    {
      provide: APPOINTMENT_STORE,
      useClass: AppointmentAdapter,
    },
  ],
})
export class AppointmentModule {}
