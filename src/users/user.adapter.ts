import { ConflictException, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { User } from './entities/user.entity';
import type {
  NewUser,
  UserDirectoryPort,
  UserRecord,
} from './ports/user-directory.port';
import { isRecord } from '../common/utils/error.utils';

const PG_UNIQUE_VIOLATION = '23505';

/**
 * Adapter: implements UserDirectoryPort with TypeORM.
 */
@Injectable()
export class UserAdapter implements UserDirectoryPort {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async findById(id: string): Promise<UserRecord | null> {
    const user = await this.userRepository.findOneBy({ id });
    return user ? this.toRecord(user) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const user = await this.userRepository.findOneBy({ email });
    return user ? this.toRecord(user) : null;
  }

  async create(input: NewUser): Promise<UserRecord> {
    const user = this.userRepository.create(input);

    try {
      const saved = await this.userRepository.save(user);
      return this.toRecord(saved);
    } catch (error) {
      if (this.isUniqueViolation(error)) {
        throw new ConflictException('An account with this email already exists');
      }
      throw error;
    }
  }

  async updateFullName(
    id: string,
    fullName: string,
  ): Promise<UserRecord | null> {
    const result = await this.userRepository.update(id, { fullName });

    if (!result.affected) {
      return null;
    }

    return this.findById(id);
  }

  private isUniqueViolation(error: unknown): boolean {
    return (
      error instanceof QueryFailedError &&
      isRecord(error.driverError) &&
      error.driverError.code === PG_UNIQUE_VIOLATION
    );
  }

  private toRecord(user: User): UserRecord {
    return {
      id: user.id,
      fullName: user.fullName,
      email: user.email,
      passwordHash: user.passwordHash,
      role: user.role,
      phone: user.phone,
      createdAt: user.createdAt,
    };
  }
}
