import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { Appointment } from './entities/appointment.entity';
import type {
  AppointmentChanges,
  AppointmentData,
  AppointmentQuery,
  AppointmentStorePort,
  NewAppointment,
  SortDirection,
} from './ports/appointment-store.port';

/**
 * Adapter: implements AppointmentStorePort with TypeORM.
 */
@Injectable()
export class AppointmentAdapter implements AppointmentStorePort {
  constructor(
    @InjectRepository(Appointment)
    private readonly appointmentRepository: Repository<Appointment>,
  ) {}

  async findById(id: string): Promise<AppointmentData | null> {
    const appointment = await this.appointmentRepository.findOneBy({ id });
    return appointment ? this.toData(appointment) : null;
  }

  async findMany(
    query: AppointmentQuery,
    order: SortDirection,
  ): Promise<AppointmentData[]> {
    const appointments = await this.appointmentRepository.find({
      where: this.toWhere(query),
      order: { startTime: order },
    });

    return appointments.map((appointment) => this.toData(appointment));
  }

  async insert(input: NewAppointment): Promise<AppointmentData> {
    const appointment = this.appointmentRepository.create(input);
    const saved = await this.appointmentRepository.save(appointment);
    return this.toData(saved);
  }

  async updateById(
    id: string,
    changes: AppointmentChanges,
  ): Promise<AppointmentData | null> {
    const result = await this.appointmentRepository.update(id, changes);

    if (!result.affected) {
      return null;
    }

    return this.findById(id);
  }

  private toWhere(query: AppointmentQuery): FindOptionsWhere<Appointment> {
    const where: FindOptionsWhere<Appointment> = {};

    if (query.patientId !== undefined) {
      where.patientId = query.patientId;
    }

    if (query.status !== undefined) {
      where.status = query.status;
    }

    if (query.startFrom && query.startTo) {
      where.startTime = Between(query.startFrom, query.startTo);
    } else if (query.startFrom) {
      where.startTime = MoreThanOrEqual(query.startFrom);
    } else if (query.startTo) {
      where.startTime = LessThanOrEqual(query.startTo);
    }

    return where;
  }

  /**
   * Mapper: entity -> domain DTO
   */
  private toData(appointment: Appointment): AppointmentData {
    return {
      id: appointment.id,
      patientId: appointment.patientId,
      patientName: appointment.patientName,
      startTime: appointment.startTime,
      endTime: appointment.endTime,
      service: appointment.service,
      status: appointment.status,
    };
  }
}
