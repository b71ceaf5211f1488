import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { Appointment } from '../../appointment/entities/appointment.entity';
import { Role } from '../enums/role.enum';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 120 })
  fullName!: string;

  @Column({ type: 'varchar', unique: true })
  email!: string;

  // bcrypt hash; never leaves the adapter except for credential checks
  @Column({ type: 'varchar' })
  passwordHash!: string;

  @Column({ type: 'varchar', length: 16, default: Role.CLIENT })
  role!: Role;

  @Column({ type: 'varchar', length: 32, nullable: true })
  phone!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @OneToMany('Appointment', 'patient')
  appointments!: Appointment[];
}
