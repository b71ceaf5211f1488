import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import type { User } from '../../users/entities/user.entity';
import { AppointmentStatus } from '../enums/appointment-status';

@Entity('appointments')
export class Appointment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_appointments_patientId')
  @Column({ type: 'uuid' })
  patientId!: string;

  @ManyToOne('User', 'appointments')
  @JoinColumn({ name: 'patientId' })
  patient!: User;

  // Name as it was when the appointment was booked; profile renames do not touch it.
  @Column({ type: 'varchar', length: 120 })
  patientName!: string;

  @Index('IDX_appointments_startTime')
  @Column({ type: 'timestamptz' })
  startTime!: Date;

  @Column({ type: 'timestamptz' })
  endTime!: Date;

  @Column({ type: 'varchar' })
  service!: string;

  @Column({ type: 'varchar', length: 32, default: AppointmentStatus.SCHEDULED })
  status!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
