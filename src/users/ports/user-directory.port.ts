import type { Role } from '../enums/role.enum';

/**
 * Output port for user lookups and the few writes the domain needs.
 * Services depend on this contract only; the TypeORM adapter implements it.
 */
export interface UserDirectoryPort {
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  /** @throws ConflictException when the email is already registered */
  create(input: NewUser): Promise<UserRecord>;
  updateFullName(id: string, fullName: string): Promise<UserRecord | null>;
}

export interface UserRecord {
  id: string;
  fullName: string;
  email: string;
  passwordHash: string;
  role: Role;
  phone: string | null;
  createdAt: Date;
}

export type NewUser = Omit<UserRecord, 'id' | 'createdAt'>;

/** Outward representation: the credential never leaves the service. */
export type PublicUser = Omit<UserRecord, 'passwordHash'>;

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    fullName: user.fullName,
    email: user.email,
    role: user.role,
    phone: user.phone,
    createdAt: user.createdAt,
  };
}

export const USER_DIRECTORY = Symbol('USER_DIRECTORY');
