import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AppointmentService } from './appointment.service';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { Caller } from '../auth/types/caller.type';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import {
  createAppointmentSchema,
  listAppointmentsQuerySchema,
  updateAppointmentSchema,
} from './dto/appointment.schemas';
import type {
  CreateAppointmentDto,
  ListAppointmentsQueryDto,
  UpdateAppointmentDto,
} from './dto/appointment.schemas';
import type { AppointmentData } from './ports/appointment-store.port';

// Ids are uuid columns; anything else is refused before it reaches the store.
const appointmentIdPipe = new ParseUUIDPipe({
  exceptionFactory: () => new BadRequestException('Invalid appointment ID'),
});

@Controller('api')
@UseGuards(JwtAuthGuard)
export class AppointmentController {
  constructor(private readonly appointmentService: AppointmentService) {}

  // e.g. /api/appointments?startDate=2024-07-01&endDate=2024-07-31&status=Scheduled
  @Get('appointments')
  list(
    @CurrentUser() caller: Caller,
    @Query(new ZodValidationPipe(listAppointmentsQuerySchema))
    filters: ListAppointmentsQueryDto,
  ): Promise<AppointmentData[]> {
    return this.appointmentService.list(caller, filters, 'chronological');
  }

  // :id is not read; clients are scoped by their session, practitioners by ?patientId=
  @Get('appointment/user/:id')
  listForUser(
    @CurrentUser() caller: Caller,
    @Query(new ZodValidationPipe(listAppointmentsQuerySchema))
    filters: ListAppointmentsQueryDto,
  ): Promise<AppointmentData[]> {
    return this.appointmentService.list(caller, filters, 'newest-first');
  }

  @Get('appointments/:id')
  get(
    @CurrentUser() caller: Caller,
    @Param('id', appointmentIdPipe) id: string,
  ): Promise<AppointmentData> {
    return this.appointmentService.get(caller, id);
  }

  @Post('appointments')
  create(
    @CurrentUser() caller: Caller,
    @Body(new ZodValidationPipe(createAppointmentSchema))
    body: CreateAppointmentDto,
  ): Promise<AppointmentData> {
    return this.appointmentService.create(caller, body);
  }

  @Put('appointments/:id')
  update(
    @CurrentUser() caller: Caller,
    @Param('id', appointmentIdPipe) id: string,
    @Body(new ZodValidationPipe(updateAppointmentSchema))
    body: UpdateAppointmentDto,
  ): Promise<AppointmentData> {
    return this.appointmentService.update(caller, id, body);
  }

  @Patch('appointments/:id/cancel')
  cancel(
    @CurrentUser() caller: Caller,
    @Param('id', appointmentIdPipe) id: string,
  ): Promise<AppointmentData> {
    return this.appointmentService.cancel(caller, id);
  }
}
